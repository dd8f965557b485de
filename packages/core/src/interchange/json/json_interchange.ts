import { EncodingError } from "../../errors";
import type { DataInterchange } from "../data_interchange";
import { canonicalize } from "./canonical_json";
import type { JsonValue } from "./json_value";
import { jsonEquals, toJsonValue } from "./json_value";

/**
 * JSON implementation of DataInterchange.
 *
 * Canonical bytes are the UTF-8 encoding of the key-sorted, whitespace-free
 * form, so whitespace and member order in received documents do not affect
 * signatures.
 *
 * @example
 * ```typescript
 * const raw = Json.fromBytes(bytes);
 * const signedBytes = Json.canonicalize(raw);
 * ```
 */
export class JsonInterchange implements DataInterchange<JsonValue> {
  readonly extension = 'json';

  private readonly decoder = new TextDecoder('utf-8', { fatal: true });
  private readonly encoder = new TextEncoder();

  fromBytes(bytes: Uint8Array): JsonValue {
    let text: string;
    try {
      text = this.decoder.decode(bytes);
    } catch (error) {
      throw new EncodingError(`Invalid UTF-8 in JSON document: ${error instanceof Error ? error.message : String(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new EncodingError(`Invalid JSON document: ${error instanceof Error ? error.message : String(error)}`);
    }
    return toJsonValue(parsed);
  }

  serialize(value: unknown): JsonValue {
    return toJsonValue(value);
  }

  deserialize(raw: JsonValue): unknown {
    return toJsonValue(raw);
  }

  canonicalize(raw: JsonValue): Uint8Array {
    return this.encoder.encode(canonicalize(raw));
  }

  equals(a: JsonValue, b: JsonValue): boolean {
    return jsonEquals(a, b);
  }

  pretty(raw: JsonValue): string {
    return JSON.stringify(raw, null, 2);
  }
}

export const Json = new JsonInterchange();
