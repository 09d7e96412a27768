/**
 * JSON Types
 *
 * Event payloads are plain JSON so every backend can store them
 * without a custom codec. Object key order is preserved as inserted.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | readonly JsonValue[] | JsonObject;

export interface JsonObject {
  readonly [key: string]: JsonValue;
}
