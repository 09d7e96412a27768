/**
 * @causal-log/event-store — Event model and record codec.
 *
 * Events are frozen on construction; nothing in the store ever mutates
 * one. The record codec is the single place where events cross a
 * process boundary (JSONL lines, SQLite rows). It accepts records
 * written by older writers:
 * - `version` is accepted in place of `schemaVersion`
 * - numeric versions are stringified, a missing version is "1.0.0"
 * - a payload stored as a JSON-encoded string is decoded
 */

import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import type { Event, EventRecord, Hlc, JsonObject } from "@causal-log/types";
import { DEFAULT_SCHEMA_VERSION, isHlc, isJsonObject } from "@causal-log/types";
import { compareHlc, formatHlc, hlcEquals, parseHlc } from "./hlc.js";
import { EventStoreError } from "./types.js";

// =============================================================================
// Construction
// =============================================================================

export interface CreateEventInput<TType extends string = string> {
  readonly id: Hlc;
  readonly type: TType;
  readonly data?: JsonObject;
  readonly schemaVersion?: string;
}

/**
 * Create an immutable Event.
 *
 * The payload is copied and deep-frozen, so later changes to the
 * caller's object never leak into the log.
 *
 * @throws EventStoreError("INVALID_EVENT") for an empty type, a bad id,
 * or a payload that is not a JSON object
 */
export function createEvent<TType extends string>(
  input: CreateEventInput<TType>,
): Event<TType> {
  if (input.type.length === 0) {
    throw new EventStoreError("INVALID_EVENT", "Event type must be a non-empty string");
  }
  if (!isHlc(input.id)) {
    throw new EventStoreError("INVALID_EVENT", "Event id must be a valid HLC");
  }

  const data: unknown = input.data ?? {};
  if (!isJsonObject(data)) {
    throw new EventStoreError(
      "INVALID_EVENT",
      `Payload of "${input.type}" must be a JSON object`,
      formatHlc(input.id),
    );
  }

  return Object.freeze({
    id: Object.freeze({ ...input.id }),
    type: input.type,
    data: deepFreeze(structuredClone(data)),
    schemaVersion: input.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
  });
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const member of Object.values(value)) {
      deepFreeze(member);
    }
    Object.freeze(value);
  }
  return value;
}

// =============================================================================
// Equality & Ordering
// =============================================================================

/**
 * Structural equality over all fields.
 * Payloads compare as JSON values, so key order does not matter.
 */
export function eventsEqual(a: Event, b: Event): boolean {
  return (
    hlcEquals(a.id, b.id) &&
    a.type === b.type &&
    a.schemaVersion === b.schemaVersion &&
    canonicalize(a.data) === canonicalize(b.data)
  );
}

export function compareEvents(a: Event, b: Event): -1 | 0 | 1 {
  return compareHlc(a.id, b.id);
}

/**
 * Return a copy sorted ascending by id. Stable for equal ids.
 */
export function sortEvents<E extends Event>(events: Iterable<E>): E[] {
  return [...events].sort(compareEvents);
}

// =============================================================================
// Record codec
// =============================================================================

const RawRecordSchema = z.object({
  id: z.string(),
  type: z.string().min(1),
  data: z.unknown().optional(),
  schemaVersion: z.union([z.string(), z.number()]).optional(),
  version: z.union([z.string(), z.number()]).optional(),
});

export function toEventRecord(event: Event): EventRecord {
  return {
    id: formatHlc(event.id),
    type: event.type,
    data: event.data,
    schemaVersion: event.schemaVersion,
  };
}

/**
 * Decode a persisted record into an Event.
 *
 * @throws EventStoreError("INVALID_RECORD") if the record shape is wrong
 * @throws HlcError("MALFORMED_IDENTIFIER") if the id does not parse
 */
export function fromEventRecord(raw: unknown): Event {
  const parsed = RawRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EventStoreError(
      "INVALID_RECORD",
      `Invalid event record: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
    );
  }

  const record = parsed.data;
  const id = parseHlc(record.id);

  return createEvent({
    id,
    type: record.type,
    data: decodeData(record.data, record.id),
    schemaVersion: decodeVersion(record.schemaVersion ?? record.version),
  });
}

function decodeData(raw: unknown, id: string): JsonObject {
  if (raw === undefined || raw === null) {
    return {};
  }

  let value: unknown = raw;
  if (typeof value === "string") {
    try {
      value = JSON.parse(value) as unknown;
    } catch {
      throw new EventStoreError("INVALID_RECORD", `Payload of ${id} is not valid JSON`, id);
    }
  }

  if (!isJsonObject(value)) {
    throw new EventStoreError("INVALID_RECORD", `Payload of ${id} must be a JSON object`, id);
  }
  return value;
}

function decodeVersion(raw: string | number | undefined): string {
  if (raw === undefined) {
    return DEFAULT_SCHEMA_VERSION;
  }
  return String(raw);
}

/**
 * Encode an event as one JSON line (without the trailing newline).
 */
export function serializeEvent(event: Event): string {
  return JSON.stringify(toEventRecord(event));
}

/**
 * Decode one JSON line produced by serializeEvent.
 *
 * @throws EventStoreError("INVALID_RECORD") if the line is not valid JSON
 */
export function deserializeEvent(line: string): Event {
  let raw: unknown;
  try {
    raw = JSON.parse(line) as unknown;
  } catch {
    throw new EventStoreError("INVALID_RECORD", "Event line is not valid JSON");
  }
  return fromEventRecord(raw);
}
