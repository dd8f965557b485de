import { HashValue, calculateHashes } from "../../crypto";
import type { HashAlgorithm } from "../../crypto";
import { EncodingError } from "../../errors";
import { Schemas } from "../../schemas";
import { SchemaValidationCache, assertSchema } from "../../schemas/schema_cache";
import type { MetadataType } from "../metadata/metadata.types";
import { TargetPath } from "../paths";

/**
 * Length and digests of one target file.
 */
export interface TargetInfo {
  readonly length: number;
  readonly hashes: Readonly<Record<string, string>>;
}

/**
 * Release manifest: every target path it lists has passed `safePath`.
 */
export interface TargetsMetadata {
  readonly version: number;
  /** ISO 8601 date-time after which the manifest must not be trusted. */
  readonly expires: string;
  readonly targets: Readonly<Record<string, TargetInfo>>;
}

type TargetsJson = {
  _type: string;
  version: number;
  expires: string;
  targets: Record<string, { length: number; hashes: Record<string, string> }>;
};

export const TARGETS_TYPE = 'targets';

function defineTarget(targets: Record<string, TargetInfo>, path: TargetPath, info: TargetInfo): void {
  Object.defineProperty(targets, path.value, { value: info, enumerable: true, writable: true, configurable: true });
}

const getTargetsValidator = SchemaValidationCache.validatorFor<TargetsJson>(Schemas.TargetsMetadata);

export const TARGETS_METADATA: MetadataType<TargetsMetadata> = {
  typeName: TARGETS_TYPE,

  version: (targets) => targets.version,

  encode: (targets) => ({
    _type: TARGETS_TYPE,
    version: targets.version,
    expires: targets.expires,
    targets: targets.targets,
  }),

  decode: (value) => {
    assertSchema(getTargetsValidator(), value, 'Targets');
    if (value._type !== TARGETS_TYPE) {
      throw new EncodingError(`Attempted to decode targets metadata labeled as ${JSON.stringify(value._type)}`);
    }

    const targets: Record<string, TargetInfo> = {};
    for (const [path, info] of Object.entries(value.targets)) {
      defineTarget(targets, new TargetPath(path), { length: info.length, hashes: info.hashes });
    }

    return {
      version: value.version,
      expires: value.expires,
      targets,
    };
  },
};

/**
 * Describes target contents for inclusion in a manifest.
 */
export function describeTarget(contents: Uint8Array, algorithms: readonly HashAlgorithm[] = ['sha256']): TargetInfo {
  return {
    length: contents.length,
    hashes: calculateHashes(contents, algorithms),
  };
}

/**
 * @throws EncodingError if any target path is unsafe or the version is not a positive integer
 */
export function createTargetsMetadata(
  version: number,
  expires: Date,
  targets: Readonly<Record<string, TargetInfo>>
): TargetsMetadata {
  if (!Number.isInteger(version) || version < 1) {
    throw new EncodingError(`Targets version must be a positive integer, got ${version}`);
  }

  const listed: Record<string, TargetInfo> = {};
  for (const [path, info] of Object.entries(targets)) {
    defineTarget(listed, new TargetPath(path), info);
  }

  return {
    version,
    expires: expires.toISOString().replace(/\.\d{3}Z$/, 'Z'),
    targets: listed,
  };
}

export function targetPaths(targets: TargetsMetadata): TargetPath[] {
  return Object.keys(targets.targets)
    .map(path => new TargetPath(path))
    .sort((a, b) => a.compare(b));
}

/**
 * Hash-prefixed names of a target, one per listed digest, sorted by algorithm.
 */
export function hashPrefixedPaths(path: TargetPath, info: TargetInfo): TargetPath[] {
  return Object.keys(info.hashes)
    .sort()
    .map(algorithm => path.withHashPrefix(HashValue.fromHex(info.hashes[algorithm] ?? '')));
}

export function isExpired(targets: TargetsMetadata, now: Date = new Date()): boolean {
  return Date.parse(targets.expires) <= now.getTime();
}
