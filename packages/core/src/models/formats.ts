import { Json } from "../interchange";
import type { JsonValue } from "../interchange";
import { LINK_METADATA } from "./link";
import type { LinkMetadata } from "./link";
import { defineFormat } from "./metadata";
import type { MetadataFormat } from "./metadata";
import { TARGETS_METADATA } from "./targets";
import type { TargetsMetadata } from "./targets";

/** Link attestations in canonical JSON. */
export const JsonLink: MetadataFormat<JsonValue, LinkMetadata> = defineFormat(Json, LINK_METADATA);

/** Targets manifests in canonical JSON. */
export const JsonTargets: MetadataFormat<JsonValue, TargetsMetadata> = defineFormat(Json, TARGETS_METADATA);
