import { createPrivateKey, createPublicKey, generateKeyPair, sign as signBytes, verify as verifyBytes } from "crypto";
import type { KeyObject } from "crypto";
import { promisify } from "util";
import { KeyFormatError, SignatureVerificationError } from "../errors";
import { canonicalize } from "../interchange/json/canonical_json";
import { Schemas } from "../schemas";
import { SchemaValidationCache, formatSchemaErrors } from "../schemas/schema_cache";
import type { KeyId, PublicKeyJson, Signature, Signer, Verifier } from "./crypto.types";
import { calculateHash } from "./hash";

const generateKeyPairAsync = promisify(generateKeyPair);
const getPublicKeyValidator = SchemaValidationCache.validatorFor<PublicKeyJson>(Schemas.PublicKey);

/**
 * SPKI DER structure for Ed25519 (RFC 8410):
 * [algorithm identifier (12 bytes)] + [raw public key (32 bytes)]
 */
const ED25519_SPKI_PREFIX = Buffer.from([
  0x30, 0x2a, 0x30, 0x05, 0x06, 0x03, 0x2b, 0x65,
  0x70, 0x03, 0x21, 0x00
]);
const ED25519_PUBLIC_KEY_LENGTH = 32;
const ED25519_SIGNATURE_HEX = /^[0-9a-f]{128}$/;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Key ID: SHA-256 over the canonical JSON of the key document,
 * without `keyid_hash_algorithms`.
 */
function computeKeyId(publicHex: string): KeyId {
  const keyDocument = { keytype: 'ed25519', scheme: 'ed25519', keyval: { public: publicHex } };
  return calculateHash(canonicalize(keyDocument)).toString();
}

/**
 * An Ed25519 public key.
 */
export class PublicKey implements Verifier {
  readonly keyId: KeyId;
  private readonly raw: Buffer;
  private readonly keyObject: KeyObject;

  private constructor(raw: Buffer, keyObject: KeyObject) {
    this.raw = raw;
    this.keyObject = keyObject;
    this.keyId = computeKeyId(raw.toString('hex'));
  }

  /**
   * Builds a key from its raw 32 bytes.
   */
  static fromRaw(raw: Uint8Array): PublicKey {
    if (raw.length !== ED25519_PUBLIC_KEY_LENGTH) {
      throw new KeyFormatError(`Ed25519 public key must be ${ED25519_PUBLIC_KEY_LENGTH} bytes, got ${raw.length}`);
    }
    const rawKey = Buffer.from(raw);
    let keyObject: KeyObject;
    try {
      keyObject = createPublicKey({
        key: Buffer.concat([ED25519_SPKI_PREFIX, rawKey]),
        format: 'der',
        type: 'spki'
      });
    } catch (error) {
      throw new KeyFormatError(`Invalid Ed25519 public key: ${errorMessage(error)}`);
    }
    return new PublicKey(rawKey, keyObject);
  }

  static fromSpki(der: Uint8Array): PublicKey {
    let keyObject: KeyObject;
    try {
      keyObject = createPublicKey({ key: Buffer.from(der), format: 'der', type: 'spki' });
    } catch (error) {
      throw new KeyFormatError(`Unable to parse SPKI public key: ${errorMessage(error)}`);
    }
    return PublicKey.fromKeyObject(keyObject);
  }

  static fromPem(pem: string): PublicKey {
    let keyObject: KeyObject;
    try {
      keyObject = createPublicKey({ key: pem, format: 'pem' });
    } catch (error) {
      throw new KeyFormatError(`Unable to parse PEM public key: ${errorMessage(error)}`);
    }
    return PublicKey.fromKeyObject(keyObject);
  }

  /**
   * Parses an in-toto key document (`{keytype, scheme, keyval: {public}}`).
   */
  static fromJSON(value: unknown): PublicKey {
    const validator = getPublicKeyValidator();
    if (!validator(value)) {
      const summary = formatSchemaErrors(validator.errors)
        .map(err => `${err.field}: ${err.message}`)
        .join(', ');
      throw new KeyFormatError(`Invalid public key document: ${summary}`);
    }
    return PublicKey.fromRaw(Buffer.from(value.keyval.public, 'hex'));
  }

  static fromKeyObject(keyObject: KeyObject): PublicKey {
    if (keyObject.asymmetricKeyType !== 'ed25519') {
      throw new KeyFormatError(`Unsupported key type: ${keyObject.asymmetricKeyType ?? 'unknown'}`);
    }
    const spki = keyObject.export({ format: 'der', type: 'spki' });
    return new PublicKey(spki.subarray(-ED25519_PUBLIC_KEY_LENGTH), keyObject);
  }

  get publicHex(): string {
    return this.raw.toString('hex');
  }

  /**
   * Checks `signature` over `bytes`.
   * @throws SignatureVerificationError if the signature is malformed, belongs to another key or does not verify
   */
  verify(bytes: Uint8Array, signature: Signature): void {
    if (signature.keyid !== this.keyId) {
      throw new SignatureVerificationError(
        `Signature from key ID ${signature.keyid} cannot be checked with key ID ${this.keyId}`,
        signature.keyid
      );
    }
    if (!ED25519_SIGNATURE_HEX.test(signature.sig)) {
      throw new SignatureVerificationError(`Malformed Ed25519 signature from key ID ${this.keyId}`, this.keyId);
    }

    let isValid: boolean;
    try {
      isValid = verifyBytes(null, bytes, this.keyObject, Buffer.from(signature.sig, 'hex'));
    } catch (error) {
      throw new SignatureVerificationError(
        `Unable to check signature from key ID ${this.keyId}: ${errorMessage(error)}`,
        this.keyId
      );
    }

    if (!isValid) {
      throw new SignatureVerificationError(`Invalid signature from key ID ${this.keyId}`, this.keyId);
    }
  }

  equals(other: PublicKey): boolean {
    return this.raw.equals(other.raw);
  }

  toPem(): string {
    return this.keyObject.export({ format: 'pem', type: 'spki' }).toString();
  }

  toJSON(): PublicKeyJson {
    return {
      keytype: 'ed25519',
      scheme: 'ed25519',
      keyval: { public: this.publicHex },
    };
  }
}

/**
 * An Ed25519 private key.
 *
 * The private key never leaves the KeyObject except through `toPkcs8Pem`.
 */
export class PrivateKey implements Signer {
  readonly publicKey: PublicKey;
  private readonly keyObject: KeyObject;

  private constructor(keyObject: KeyObject) {
    this.keyObject = keyObject;
    this.publicKey = PublicKey.fromKeyObject(createPublicKey(keyObject));
  }

  /**
   * Generates a new Ed25519 key pair.
   */
  static async generate(): Promise<PrivateKey> {
    const { privateKey } = await generateKeyPairAsync('ed25519', {
      publicKeyEncoding: { type: 'spki', format: 'der' },
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    });
    return PrivateKey.fromPkcs8(privateKey);
  }

  /**
   * Parses a PKCS#8 key, PEM when given a string and DER when given bytes.
   */
  static fromPkcs8(input: Uint8Array | string): PrivateKey {
    let keyObject: KeyObject;
    try {
      keyObject = typeof input === 'string'
        ? createPrivateKey({ key: input, format: 'pem' })
        : createPrivateKey({ key: Buffer.from(input), format: 'der', type: 'pkcs8' });
    } catch (error) {
      throw new KeyFormatError(`Unable to parse PKCS#8 private key: ${errorMessage(error)}`);
    }

    if (keyObject.asymmetricKeyType !== 'ed25519') {
      throw new KeyFormatError(`Unsupported key type: ${keyObject.asymmetricKeyType ?? 'unknown'}`);
    }
    return new PrivateKey(keyObject);
  }

  get keyId(): KeyId {
    return this.publicKey.keyId;
  }

  sign(bytes: Uint8Array): Signature {
    return {
      keyid: this.keyId,
      sig: signBytes(null, bytes, this.keyObject).toString('hex'),
    };
  }

  toPkcs8Pem(): string {
    return this.keyObject.export({ format: 'pem', type: 'pkcs8' }).toString();
  }
}
