export type { DataInterchange } from './data_interchange';
export type { JsonValue, JsonObject, JsonArray, JsonPrimitive } from './json/json_value';
export { toJsonValue, jsonEquals, isJsonObject } from './json/json_value';
export { canonicalize } from './json/canonical_json';
export { JsonInterchange, Json } from './json/json_interchange';
