/**
 * @causal-log/types — Shared types for the causal-log stack.
 *
 * These types are used across all causal-log packages:
 * - Hybrid Logical Clock identifiers
 * - Events and their persisted record form
 * - JSON payload values
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// JSON types
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
} from "./json.js";

// HLC types
export type { Hlc } from "./hlc.js";
export { HLC_MAX_COUNTER } from "./hlc.js";

// Event types
export type { Event, EventRecord } from "./event.js";
export { DEFAULT_SCHEMA_VERSION } from "./event.js";

// Runtime type guards
export {
  isJsonValue,
  isJsonObject,
  isHlc,
  isEvent,
  isEventRecord,
} from "./guards.js";
