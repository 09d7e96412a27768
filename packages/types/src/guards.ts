/**
 * Runtime Type Guards
 *
 * Narrowing functions for the shared types.
 * These enable safe runtime validation at system boundaries
 * (deserialized records, rows read back from storage).
 */

import type { Event, EventRecord } from "./event.js";
import type { Hlc } from "./hlc.js";
import { HLC_MAX_COUNTER } from "./hlc.js";
import type { JsonObject, JsonValue } from "./json.js";

// =============================================================================
// JSON guards
// =============================================================================

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return isJsonObject(value);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return false;
  return Object.values(value).every(isJsonValue);
}

// =============================================================================
// HLC guards
// =============================================================================

export function isHlc(value: unknown): value is Hlc {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.physicalTimeMillis === "number" &&
    Number.isSafeInteger(v.physicalTimeMillis) &&
    v.physicalTimeMillis >= 0 &&
    typeof v.counter === "number" &&
    Number.isInteger(v.counter) &&
    v.counter >= 0 &&
    v.counter <= HLC_MAX_COUNTER &&
    typeof v.nodeId === "string" &&
    v.nodeId.length > 0
  );
}

// =============================================================================
// Event guards
// =============================================================================

export function isEvent(value: unknown): value is Event {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isHlc(v.id) &&
    typeof v.type === "string" &&
    v.type.length > 0 &&
    isJsonObject(v.data) &&
    typeof v.schemaVersion === "string"
  );
}

export function isEventRecord(value: unknown): value is EventRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.type === "string" &&
    isJsonObject(v.data) &&
    typeof v.schemaVersion === "string"
  );
}
