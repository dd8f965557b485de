/**
 * DataInterchange Interface
 *
 * Abstracts the serialization format signed metadata travels in.
 * `TRaw` is the format's own raw data model (a JSON value tree for `Json`).
 *
 * Every method throws `EncodingError` when the input cannot be represented.
 *
 * @module interchange
 */
export interface DataInterchange<TRaw> {
  /** File extension for documents in this format, without the dot. */
  readonly extension: string;

  /** Decodes bytes received from storage or the network. */
  fromBytes(bytes: Uint8Array): TRaw;

  /** Converts a plain value into the raw data model. */
  serialize(value: unknown): TRaw;

  /** Converts raw data back into a plain value owned by the caller. */
  deserialize(raw: TRaw): unknown;

  /**
   * Produces the deterministic byte form signatures are computed over.
   * Logically-equal raw values must canonicalize to identical bytes.
   */
  canonicalize(raw: TRaw): Uint8Array;

  /** Structural equality of two raw values. */
  equals(a: TRaw, b: TRaw): boolean;

  /** Human-readable rendering, not suitable for signing. */
  pretty(raw: TRaw): string;
}
