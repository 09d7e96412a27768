/**
 * @causal-log/event-store — Core types.
 *
 * Defines the interfaces and types for append-only event persistence.
 *
 * Design principles:
 * - Events are immutable after creation
 * - The log is append-only (no single-event UPDATE or DELETE)
 * - Every event has a unique HLC id within a store
 * - Persistence is pluggable; dispatch and notification are not
 */

import type { Event, Hlc } from "@causal-log/types";

// =============================================================================
// Callbacks & Subscriptions
// =============================================================================

/**
 * Callback invoked once per dispatched event (a projection's `onEvent`).
 */
export type ProcessEvent = (event: Event) => void | Promise<void>;

/**
 * Callback for event subscriptions.
 */
export type EventHandler = (event: Event) => void;

/**
 * Callback for clear notifications (the store became empty).
 */
export type ClearedHandler = () => void;

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  /** Stop receiving notifications. Calling twice is harmless. */
  unsubscribe(): void;
}

/**
 * Result of an atomic read-then-subscribe.
 */
export interface SnapshotSubscription {
  /** Every event persisted at the moment of subscription */
  readonly events: readonly Event[];

  /** Live subscription for events dispatched afterwards */
  readonly subscription: Subscription;
}

// =============================================================================
// Backend
// =============================================================================

/**
 * Identifies a backend implementation.
 */
export type BackendKind = "memory" | "jsonl" | "sqlite";

/**
 * Persistence strategy behind an EventStore.
 *
 * Invariants:
 * - getAll returns events in insertion order
 * - A second write with an existing id replaces the earlier event in
 *   place (last write wins)
 * - addAll is atomic only where the backend says so
 */
export interface EventBackend {
  readonly kind: BackendKind;

  /** Persist one event */
  add(event: Event): Promise<void>;

  /** Persist events in the given order */
  addAll(events: readonly Event[]): Promise<void>;

  /** Every persisted event, in insertion order */
  getAll(): Promise<readonly Event[]>;

  /** The event with this canonical id, if persisted */
  getById(id: string): Promise<Event | undefined>;

  /** Remove every persisted event */
  deleteAll(): Promise<void>;

  /** Release handles. Idempotent. */
  dispose(): Promise<void>;
}

/**
 * Identifier accepted by lookups: an HLC or its canonical string.
 */
export type EventId = Hlc | string;

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for EventStore operations.
 */
export type EventStoreErrorCode =
  | "STORE_CLOSED"
  | "DISPATCH_CANCELLED"
  | "INVALID_RECORD"
  | "INVALID_EVENT";

/**
 * Error thrown by EventStore operations.
 */
export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly eventId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
