import { compareKeyIds } from "../../crypto";
import type { KeyId, Signature, Signer, Verifier } from "../../crypto";
import { IllegalArgumentError, VerificationFailureError } from "../../errors";
import { Schemas } from "../../schemas";
import { SchemaValidationCache, assertSchema } from "../../schemas/schema_cache";
import type { MetadataFormat } from "./metadata.types";
import { defaultVerificationObserver } from "./verification_observer";
import type { VerificationObserver } from "./verification_observer";

type SignedEnvelope = {
  signatures: Array<{ keyid: string; sig: string }>;
  signed: unknown;
};

const getEnvelopeValidator = SchemaValidationCache.validatorFor<SignedEnvelope>(Schemas.SignedMetadata);

function copySignature(signature: Signature): Signature {
  return Object.freeze({ keyid: signature.keyid, sig: signature.sig });
}

/**
 * Unverified raw metadata with attached signatures, tagged with the format
 * the bytes are expected to be in.
 */
export class RawSignedMetadata<TRaw, M> {
  private readonly data: Uint8Array;

  constructor(bytes: Uint8Array, readonly format: MetadataFormat<TRaw, M>) {
    this.data = Uint8Array.from(bytes);
  }

  /**
   * A copy of the raw bytes.
   */
  get bytes(): Uint8Array {
    return Uint8Array.from(this.data);
  }

  /**
   * Parses the envelope without checking any signature.
   * @throws EncodingError if the bytes are not a well-formed signed document
   */
  parse(): SignedMetadata<TRaw, M> {
    const { interchange } = this.format;
    const envelope = interchange.deserialize(interchange.fromBytes(this.data));
    assertSchema(getEnvelopeValidator(), envelope, 'SignedMetadata');
    return new SignedMetadata(
      envelope.signatures,
      interchange.serialize(envelope.signed),
      this.format
    );
  }
}

/**
 * Serialized metadata with attached unverified signatures.
 *
 * Wire shape: `{ "signatures": [{ "keyid", "sig" }...], "signed": <document> }`.
 */
export class SignedMetadata<TRaw, M> {
  private readonly sigs: readonly Signature[];
  private readonly metadata: TRaw;

  constructor(signatures: readonly Signature[], metadata: TRaw, readonly format: MetadataFormat<TRaw, M>) {
    const { interchange } = format;
    this.sigs = Object.freeze(signatures.map(copySignature));
    this.metadata = interchange.serialize(interchange.deserialize(metadata));
  }

  /**
   * Creates a `SignedMetadata` carrying one signature over the canonical
   * bytes of `document`.
   */
  static create<TRaw, M>(document: M, signer: Signer, format: MetadataFormat<TRaw, M>): SignedMetadata<TRaw, M> {
    const { interchange, type } = format;
    const raw = interchange.serialize(type.encode(document));
    const signature = signer.sign(interchange.canonicalize(raw));
    return new SignedMetadata([signature], raw, format);
  }

  /**
   * The signatures, in stored order.
   */
  get signatures(): readonly Signature[] {
    return this.sigs;
  }

  /**
   * A copy of the signed raw document.
   */
  get signed(): TRaw {
    const { interchange } = this.format;
    return interchange.serialize(interchange.deserialize(this.metadata));
  }

  /**
   * Serializes this metadata to canonical bytes. Only intended for signed
   * metadata produced by this process, not for re-serializing metadata
   * obtained from a remote source:
   * - parsing drops unknown fields, which are not included in the returned bytes,
   * - the bytes are only canonical for the purpose of a signature; whitespace
   *   and member order of the original document are not preserved.
   */
  toRaw(): RawSignedMetadata<TRaw, M> {
    const { interchange } = this.format;
    const envelope = interchange.serialize({
      signatures: this.sigs,
      signed: interchange.deserialize(this.metadata),
    });
    return new RawSignedMetadata(interchange.canonicalize(envelope), this.format);
  }

  /**
   * Merges the signatures from `other` if and only if both carry the same
   * signed document. Where both hold a signature from the same key ID, the
   * one from `this` is kept. `other`'s new signatures are appended after
   * this document's, without re-sorting.
   *
   * @throws IllegalArgumentError if the signed documents differ
   */
  mergeSignatures(other: SignedMetadata<TRaw, M>): SignedMetadata<TRaw, M> {
    if (!this.format.interchange.equals(this.metadata, other.metadata)) {
      throw new IllegalArgumentError("Attempted to merge unequal metadata");
    }

    const keyIds = new Set(this.sigs.map(signature => signature.keyid));
    const merged = [
      ...this.sigs,
      ...other.sigs.filter(signature => !keyIds.has(signature.keyid)),
    ];
    return new SignedMetadata(merged, this.metadata, this.format);
  }

  /**
   * Parses this metadata without verifying signatures.
   *
   * This operation is not safe to do with metadata obtained from an untrusted source.
   */
  assumeValid(): M {
    const { interchange, type } = this.format;
    return type.decode(interchange.deserialize(this.metadata));
  }

  /**
   * Verifies that at least `threshold` distinct keys from `authorizedKeys`
   * produced a valid signature over the canonical document, then returns the
   * document.
   *
   * Signatures from unknown keys and signatures that fail to verify are
   * reported to `observer` and otherwise ignored. Scanning stops once the
   * threshold is met, so with more valid signatures than needed not all of
   * them are checked. The outcome does not depend on signature order.
   *
   * @throws VerificationFailureError if there are no signatures, the threshold is not a positive integer, or the threshold is not met
   *
   * @example
   * ```typescript
   * const link = SignedMetadataBuilder.fromMetadata(document, JsonLink)
   *   .sign(aliceKey)
   *   .sign(bobKey)
   *   .build()
   *   .verify(2, [aliceKey.publicKey, bobKey.publicKey]);
   * ```
   */
  verify(
    threshold: number,
    authorizedKeys: Iterable<Verifier>,
    observer: VerificationObserver = defaultVerificationObserver
  ): M {
    if (this.sigs.length === 0) {
      throw new VerificationFailureError("The metadata was not signed with any authorized keys.");
    }

    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new VerificationFailureError("Threshold must be strictly greater than zero");
    }

    const keys = new Map<KeyId, Verifier>();
    for (const key of authorizedKeys) {
      keys.set(key.keyId, key);
    }

    const canonicalBytes = this.format.interchange.canonicalize(this.metadata);

    // one entry per key id; a later entry replaces an earlier one
    const signaturesByKey = new Map<KeyId, Signature>();
    for (const signature of this.sigs) {
      signaturesByKey.set(signature.keyid, signature);
    }

    let signaturesNeeded = threshold;
    for (const [keyId, signature] of signaturesByKey) {
      const key = keys.get(keyId);
      if (!key) {
        observer({ kind: 'unauthorized_key', keyId });
        continue;
      }

      const failure = checkSignature(key, canonicalBytes, signature);
      if (failure) {
        observer({ kind: 'bad_signature', keyId, error: failure });
        continue;
      }

      observer({ kind: 'good_signature', keyId });
      signaturesNeeded -= 1;
      if (signaturesNeeded === 0) {
        break;
      }
    }

    if (signaturesNeeded > 0) {
      const satisfied = threshold - signaturesNeeded;
      throw new VerificationFailureError(
        `Signature threshold not met: ${satisfied}/${threshold}`,
        satisfied,
        threshold
      );
    }

    // "assume" the metadata is valid because we just verified that it is.
    return this.assumeValid();
  }

  /**
   * Key IDs of the signatures in stored order, duplicates included.
   */
  keyIds(): KeyId[] {
    return this.sigs.map(signature => signature.keyid);
  }

  /**
   * Returns a copy with signatures sorted ascending by key ID, the order
   * `SignedMetadataBuilder.build` produces.
   */
  sorted(): SignedMetadata<TRaw, M> {
    const ordered = [...this.sigs].sort((a, b) => compareKeyIds(a.keyid, b.keyid));
    return new SignedMetadata(ordered, this.metadata, this.format);
  }
}

function checkSignature(key: Verifier, bytes: Uint8Array, signature: Signature): Error | null {
  try {
    key.verify(bytes, signature);
    return null;
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}
