/**
 * Event Types
 *
 * Append-only event architecture.
 * Every state change is captured as an Event identified by an HLC.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are replayable: same events → same state
 * - No UPDATE, no DELETE of single events, only bulk clears
 */

import type { Hlc } from "./hlc.js";
import type { JsonObject } from "./json.js";

/** Schema version stamped on events that don't declare one */
export const DEFAULT_SCHEMA_VERSION = "1.0.0";

/**
 * A domain event.
 * Discriminated by `type`; the payload shape is owned by the consumer.
 */
export interface Event<TType extends string = string, TData extends JsonObject = JsonObject> {
  /** Unique identity within a store */
  readonly id: Hlc;

  /** Event type identifier (e.g., "Increment", "counter.reset") */
  readonly type: TType;

  /** Event-specific payload */
  readonly data: TData;

  /** Version of the payload schema, e.g. "1.0.0" */
  readonly schemaVersion: string;
}

/**
 * Persisted / wire form of an Event.
 * The id is carried in its canonical string form.
 */
export interface EventRecord {
  readonly id: string;
  readonly type: string;
  readonly data: JsonObject;
  readonly schemaVersion: string;
}
