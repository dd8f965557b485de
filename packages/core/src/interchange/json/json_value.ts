import { EncodingError } from "../../errors";

export type JsonPrimitive = null | boolean | number | string;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

const MAX_DEPTH = 256;

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Assigns an own data property. Plain assignment would treat a `__proto__`
 * key as a prototype change and silently drop it.
 */
export function setOwn(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

/**
 * Copies an arbitrary value into a fresh JSON value tree.
 * `undefined` object members are skipped, values with `toJSON` are expanded,
 * everything else that JSON cannot carry is rejected.
 */
export function toJsonValue(value: unknown, path: string = '$', depth: number = 0): JsonValue {
  if (depth > MAX_DEPTH) {
    throw new EncodingError(`Value nested deeper than ${MAX_DEPTH} levels at ${path}`);
  }
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new EncodingError(`Cannot encode non-finite number at ${path}`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => toJsonValue(item, `${path}[${index}]`, depth + 1));
  }
  if (typeof value === 'object') {
    if (hasToJSON(value)) {
      return toJsonValue(value.toJSON(), path, depth + 1);
    }
    if (value instanceof Map || value instanceof Set) {
      throw new EncodingError(`Cannot encode ${value.constructor.name} at ${path}`);
    }
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined) continue;
      setOwn(result, key, toJsonValue(entry, `${path}.${key}`, depth + 1));
    }
    return result;
  }
  throw new EncodingError(`Cannot encode value of type ${typeof value} at ${path}`);
}

export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') {
    return a === b;
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, index) => {
      const other = b[index];
      return other !== undefined && jsonEquals(item, other);
    });
  }
  const keysA = Object.keys(a);
  if (keysA.length !== Object.keys(b).length) return false;
  return keysA.every(key => {
    if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
    const left = a[key];
    const right = b[key];
    return left !== undefined && right !== undefined && jsonEquals(left, right);
  });
}
