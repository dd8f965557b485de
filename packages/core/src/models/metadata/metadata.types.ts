import type { DataInterchange } from "../../interchange";

/**
 * Document-schema capability for a versioned document type eligible for
 * signing. `decode` is the only way raw data becomes an `M`, so it must
 * validate structure and throw EncodingError on any mismatch.
 */
export interface MetadataType<M> {
  /** The `_type` tag the document carries, e.g. "link". */
  readonly typeName: string;
  version(document: M): number;
  encode(document: M): unknown;
  decode(value: unknown): M;
}

/**
 * Pairs a codec with a document schema. Carries no document data, only
 * which serializer and which deserializer signed metadata goes through.
 *
 * @example
 * ```typescript
 * const JsonLink = defineFormat(Json, LINK_METADATA);
 * const raw = new RawSignedMetadata(bytes, JsonLink);
 * ```
 */
export interface MetadataFormat<TRaw, M> {
  readonly interchange: DataInterchange<TRaw>;
  readonly type: MetadataType<M>;
}

export function defineFormat<TRaw, M>(
  interchange: DataInterchange<TRaw>,
  type: MetadataType<M>
): MetadataFormat<TRaw, M> {
  return Object.freeze({ interchange, type });
}
