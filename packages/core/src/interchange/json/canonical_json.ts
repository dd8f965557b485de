import { EncodingError } from "../../errors";
import type { JsonValue } from "./json_value";

/**
 * Writes a JSON value with object keys sorted at every level.
 * Objects are emitted by hand: a rebuilt object would list integer-like
 * keys first whatever order they were inserted in.
 * Canonical form admits integers only; any other number is rejected.
 */
function emit(value: JsonValue, path: string): string {
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) {
      throw new EncodingError(`Canonical JSON does not allow non-integer number ${value} at ${path}`);
    }
    return JSON.stringify(value);
  }
  if (typeof value !== 'object' || value === null) {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map((item, index) => emit(item, `${path}[${index}]`)).join(',') + ']';
  }
  const members: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const entry = value[key];
    if (entry !== undefined) {
      members.push(JSON.stringify(key) + ':' + emit(entry, `${path}.${key}`));
    }
  }
  return '{' + members.join(',') + '}';
}

/**
 * Canonically serializes a JSON value.
 * @returns A deterministic JSON string with sorted keys and no whitespace.
 */
export function canonicalize(value: JsonValue): string {
  return emit(value, '$');
}
