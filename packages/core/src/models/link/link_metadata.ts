import { EncodingError } from "../../errors";
import type { KeyId } from "../../crypto";
import { Schemas } from "../../schemas";
import { SchemaValidationCache, assertSchema } from "../../schemas/schema_cache";
import type { MetadataType } from "../metadata/metadata.types";

/**
 * Hash algorithm name -> hex digest of one artifact.
 */
export type TargetDescription = Readonly<Record<string, string>>;

/**
 * Artifact path -> digests.
 */
export type ArtifactMap = Readonly<Record<string, TargetDescription>>;

/**
 * Attestation of one supply-chain step.
 */
export interface LinkMetadata {
  readonly name: string;
  readonly materials: ArtifactMap;
  readonly products: ArtifactMap;
  readonly env: Readonly<Record<string, string>>;
  readonly byproducts: Readonly<Record<string, string>>;
}

type LinkJson = {
  _type: string;
  name: string;
  materials: Record<string, Record<string, string>>;
  products: Record<string, Record<string, string>>;
  env?: Record<string, string>;
  byproducts?: Record<string, string>;
};

export const LINK_TYPE = 'link';

/**
 * Links carry no version field; every link is this format version.
 */
export const LINK_FORMAT_VERSION = 1;

const getLinkValidator = SchemaValidationCache.validatorFor<LinkJson>(Schemas.LinkMetadata);

export const LINK_METADATA: MetadataType<LinkMetadata> = {
  typeName: LINK_TYPE,

  version: () => LINK_FORMAT_VERSION,

  encode: (link) => ({
    _type: LINK_TYPE,
    name: link.name,
    materials: link.materials,
    products: link.products,
    env: link.env,
    byproducts: link.byproducts,
  }),

  decode: (value) => {
    assertSchema(getLinkValidator(), value, 'Link');
    if (value._type !== LINK_TYPE) {
      throw new EncodingError(`Attempted to decode link metadata labeled as ${JSON.stringify(value._type)}`);
    }
    return {
      name: value.name,
      materials: value.materials,
      products: value.products,
      env: value.env ?? {},
      byproducts: value.byproducts ?? {},
    };
  },
};

/**
 * Conventional file name for a link: `<name>.<first 8 hex of key id>.link`.
 */
export function linkFilename(name: string, keyId: KeyId): string {
  return `${name}.${keyId.slice(0, 8)}.link`;
}
