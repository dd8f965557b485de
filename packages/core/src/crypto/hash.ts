import { createHash } from "crypto";
import { EncodingError } from "../errors";

export type HashAlgorithm = 'sha256' | 'sha512';

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ['sha256', 'sha512'];

const DIGEST_LENGTHS: Record<HashAlgorithm, number> = { sha256: 32, sha512: 64 };

export function isHashAlgorithm(value: string): value is HashAlgorithm {
  return HASH_ALGORITHMS.some(algorithm => algorithm === value);
}

/**
 * A digest. Displays as lowercase hex, which is what target filenames
 * are prefixed with.
 */
export class HashValue {
  private readonly digest: Buffer;

  constructor(digest: Uint8Array) {
    this.digest = Buffer.from(digest);
  }

  static fromHex(hex: string): HashValue {
    if (hex.length === 0 || hex.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(hex)) {
      throw new EncodingError(`Invalid hex digest: ${hex}`);
    }
    return new HashValue(Buffer.from(hex, 'hex'));
  }

  get bytes(): Uint8Array {
    return Uint8Array.from(this.digest);
  }

  equals(other: HashValue): boolean {
    return this.digest.equals(other.digest);
  }

  toString(): string {
    return this.digest.toString('hex');
  }

  toJSON(): string {
    return this.toString();
  }
}

/**
 * Calculates the digest of `data` with the given algorithm.
 */
export function calculateHash(data: Uint8Array | string, algorithm: HashAlgorithm = 'sha256'): HashValue {
  const hash = createHash(algorithm);
  if (typeof data === 'string') {
    hash.update(data, 'utf8');
  } else {
    hash.update(data);
  }
  return new HashValue(hash.digest());
}

/**
 * Calculates one hex digest per algorithm, keyed by algorithm name.
 */
export function calculateHashes(
  data: Uint8Array | string,
  algorithms: readonly HashAlgorithm[] = ['sha256']
): Record<string, string> {
  const hashes: Record<string, string> = {};
  for (const algorithm of algorithms) {
    hashes[algorithm] = calculateHash(data, algorithm).toString();
  }
  return hashes;
}

/**
 * Checks a hex digest against `data`. Unknown algorithms and digests of the
 * wrong length never match.
 */
export function hashMatches(data: Uint8Array | string, algorithm: string, expectedHex: string): boolean {
  if (!isHashAlgorithm(algorithm)) return false;
  if (expectedHex.length !== DIGEST_LENGTHS[algorithm] * 2) return false;
  return calculateHash(data, algorithm).toString() === expectedHex.toLowerCase();
}
