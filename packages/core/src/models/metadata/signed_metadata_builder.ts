import { compareKeyIds } from "../../crypto";
import type { KeyId, Signature, Signer } from "../../crypto";
import type { MetadataFormat } from "./metadata.types";
import { SignedMetadata } from "./signed_metadata";

/**
 * Helper to construct `SignedMetadata`.
 *
 * The canonical bytes are computed once, from a payload already known to
 * decode into `M`, and every signature is made over exactly those bytes.
 * Each method returns a new builder; a builder is never changed after
 * construction.
 *
 * @example
 * ```typescript
 * const signed = SignedMetadataBuilder.fromMetadata(link, JsonLink)
 *   .sign(aliceKey)
 *   .build();
 * const bytes = signed.toRaw().bytes;
 * ```
 */
export class SignedMetadataBuilder<TRaw, M> {
  private constructor(
    private readonly signatures: ReadonlyMap<KeyId, Signature>,
    private readonly metadata: TRaw,
    private readonly metadataBytes: Uint8Array,
    private readonly format: MetadataFormat<TRaw, M>
  ) { }

  /**
   * Create a new `SignedMetadataBuilder` from a given document.
   */
  static fromMetadata<TRaw, M>(document: M, format: MetadataFormat<TRaw, M>): SignedMetadataBuilder<TRaw, M> {
    const raw = format.interchange.serialize(format.type.encode(document));
    return SignedMetadataBuilder.fromRawMetadata(raw, format);
  }

  /**
   * Create a new `SignedMetadataBuilder` from manually serialized metadata.
   * @throws EncodingError if `raw` cannot be parsed into `M`
   */
  static fromRawMetadata<TRaw, M>(raw: TRaw, format: MetadataFormat<TRaw, M>): SignedMetadataBuilder<TRaw, M> {
    const { interchange, type } = format;
    const metadata = interchange.serialize(interchange.deserialize(raw));
    type.decode(interchange.deserialize(metadata));
    const metadataBytes = interchange.canonicalize(metadata);
    return new SignedMetadataBuilder(new Map(), metadata, metadataBytes, format);
  }

  /**
   * Signs the canonical bytes with `signer`, replacing any existing
   * signature with the same key ID.
   *
   * Holding several parties' private keys on one machine defeats the point
   * of a threshold; the usual flow is one signature per party, combined with
   * `SignedMetadata.mergeSignatures`.
   */
  sign(signer: Signer): SignedMetadataBuilder<TRaw, M> {
    const signature = signer.sign(Uint8Array.from(this.metadataBytes));
    const signatures = new Map(this.signatures);
    signatures.set(signature.keyid, signature);
    return new SignedMetadataBuilder(signatures, this.metadata, this.metadataBytes, this.format);
  }

  /**
   * Construct a new `SignedMetadata` using the included signatures, sorted by key ID.
   */
  build(): SignedMetadata<TRaw, M> {
    const signatures = [...this.signatures.values()]
      .sort((a, b) => compareKeyIds(a.keyid, b.keyid));
    return new SignedMetadata(signatures, this.metadata, this.format);
  }

  /**
   * The bytes every signature from this builder covers.
   */
  get canonicalBytes(): Uint8Array {
    return Uint8Array.from(this.metadataBytes);
  }
}
