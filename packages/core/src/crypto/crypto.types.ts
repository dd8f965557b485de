/**
 * Stable identifier of a key: lowercase hex SHA-256 of the key's canonical
 * JSON form. Totally ordered by plain string comparison.
 */
export type KeyId = string;

/**
 * A signature over canonical metadata bytes, as it appears on the wire.
 */
export type Signature = {
  readonly keyid: KeyId;
  /** Hex-encoded signature bytes. */
  readonly sig: string;
};

export type KeyType = 'ed25519';
export type SignatureScheme = 'ed25519';

/**
 * In-toto/TUF public key document.
 */
export type PublicKeyJson = {
  keytype: KeyType;
  scheme: SignatureScheme;
  keyval: { public: string };
  keyid_hash_algorithms?: string[];
};

/**
 * Anything able to sign canonical bytes.
 */
export interface Signer {
  readonly keyId: KeyId;
  sign(bytes: Uint8Array): Signature;
}

/**
 * Anything able to check a signature.
 * `verify` returns normally on success and throws SignatureVerificationError otherwise.
 */
export interface Verifier {
  readonly keyId: KeyId;
  verify(bytes: Uint8Array, signature: Signature): void;
}

export function compareKeyIds(a: KeyId, b: KeyId): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
