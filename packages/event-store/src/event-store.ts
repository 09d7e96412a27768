/**
 * @causal-log/event-store — EventStore.
 *
 * Owns an append-only log (through a pluggable backend), a FIFO
 * dispatch queue, and notification channels.
 *
 * Data flow:
 *   add/addAll → backend write → queue → dispatch loop →
 *   processEvent (the owner's callback) → onEvent subscribers
 *
 * Invariants:
 * - An event is persisted before it is dispatched; a failing callback
 *   never rolls the write back
 * - At most one dispatch is in flight: the dispatch loop, replayAll and
 *   snapshotAndSubscribe share one lock
 * - Writes (including restore and merge, which read-clear-rewrite) are
 *   serialized, so persist order equals dispatch order
 * - `add` is FIFO and never reorders; addAll, replayAll, restoreToEvent
 *   and mergeEvents sort by HLC first
 *
 * State machine: idle ⇄ dispatching, disposed (terminal).
 */

import type { Event } from "@causal-log/types";
import { sortEvents } from "./event.js";
import { formatHlc } from "./hlc.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { SerialLock } from "./serial-lock.js";
import type {
  ClearedHandler,
  EventBackend,
  EventHandler,
  EventId,
  ProcessEvent,
  SnapshotSubscription,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";

/**
 * Options for creating an EventStore.
 */
export interface EventStoreOptions {
  /** Persistence strategy */
  readonly backend: EventBackend;

  /**
   * Invoked once per dispatched event. Must not await `add`/`addAll` on
   * the same store: the nested event queues behind the one being
   * dispatched.
   */
  readonly processEvent?: ProcessEvent;

  readonly logger?: Logger;
}

export type EventStoreState = "idle" | "dispatching" | "disposed";

/** An event awaiting dispatch, and its caller's completion */
interface PendingDispatch {
  readonly event: Event;
  readonly resolve: () => void;
  readonly reject: (reason: unknown) => void;
}

/** Completion of an enqueued batch, boxed so the write lock doesn't await it */
interface Enqueued<T = void> {
  readonly dispatched: Promise<void>;
  readonly result: T;
}

export class EventStore {
  private readonly _backend: EventBackend;
  private readonly _processEvent: ProcessEvent;
  private readonly _logger: Logger;

  /** Events persisted but not yet dispatched */
  private _queue: PendingDispatch[] = [];

  /** Serializes backend writes and their enqueueing */
  private readonly _writeLock = new SerialLock();

  /** Serializes callback invocations */
  private readonly _dispatchLock = new SerialLock();

  private _draining = false;
  private _drainTask: Promise<void> = Promise.resolve();

  private readonly _eventSubscribers = new Set<EventHandler>();
  private readonly _clearedSubscribers = new Set<ClearedHandler>();

  private _disposed = false;

  constructor(options: EventStoreOptions) {
    this._backend = options.backend;
    this._processEvent = options.processEvent ?? (() => undefined);
    this._logger = (options.logger ?? silentLogger()).child({
      component: "event-store",
      backend: options.backend.kind,
    });
  }

  // ─── State ──────────────────────────────────────────────────────────

  get state(): EventStoreState {
    if (this._disposed) {
      return "disposed";
    }
    return this._draining ? "dispatching" : "idle";
  }

  get isDisposed(): boolean {
    return this._disposed;
  }

  /** Events persisted and waiting for dispatch */
  get pendingCount(): number {
    return this._queue.length;
  }

  get backend(): EventBackend {
    return this._backend;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  /**
   * Persist one event and dispatch it.
   *
   * Resolves once the callback has returned for this event. Rejects
   * with the backend's or the callback's error.
   */
  async add(event: Event): Promise<void> {
    this._assertOpen();

    const { dispatched } = await this._writeLock.run(async () => {
      await this._backend.add(event);
      return this._enqueue([event]);
    });

    await dispatched;
  }

  /**
   * Sort events by id, persist them as one batch and dispatch them in
   * that order.
   *
   * Every event of the batch is attempted; the first failure is thrown
   * once all of them have settled.
   */
  async addAll(events: Iterable<Event>): Promise<void> {
    this._assertOpen();

    const sorted = sortEvents(events);
    if (sorted.length === 0) {
      return;
    }

    const { dispatched } = await this._writeLock.run(async () => {
      await this._backend.addAll(sorted);
      return this._enqueue(sorted);
    });

    await dispatched;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  /**
   * Every persisted event, in the backend's insertion order.
   * Use `sortEvents` for HLC order.
   */
  async getAll(): Promise<readonly Event[]> {
    this._assertOpen();
    return this._writeLock.run(() => this._backend.getAll());
  }

  async getById(id: EventId): Promise<Event | undefined> {
    this._assertOpen();
    const key = typeof id === "string" ? id : formatHlc(id);
    return this._writeLock.run(() => this._backend.getById(key));
  }

  // ─── Clear ──────────────────────────────────────────────────────────

  /**
   * Remove every event.
   *
   * Queued events are cancelled: their callers reject with
   * DISPATCH_CANCELLED. onCleared subscribers are notified.
   */
  async deleteAll(): Promise<void> {
    this._assertOpen();
    await this._writeLock.run(() => this._clear());
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  /**
   * Subscribe to events as they are dispatched.
   *
   * This is not a history channel: only events dispatched after
   * subscribing are delivered. Use snapshotAndSubscribe to read history
   * and follow new events without a gap.
   */
  onEvent(handler: EventHandler): Subscription {
    this._assertOpen();
    this._eventSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._eventSubscribers.delete(handler);
      },
    };
  }

  /**
   * Subscribe to clears (deleteAll, and the clear step of restore/merge).
   */
  onCleared(handler: ClearedHandler): Subscription {
    this._assertOpen();
    this._clearedSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._clearedSubscribers.delete(handler);
      },
    };
  }

  /**
   * Read all persisted events and subscribe, with no event dispatched
   * in between.
   *
   * Events already persisted but still queued at snapshot time are in
   * `events` and are not delivered to `handler` again.
   */
  async snapshotAndSubscribe(handler: EventHandler): Promise<SnapshotSubscription> {
    this._assertOpen();

    return this._dispatchLock.run(async () => {
      const { events, queued } = await this._writeLock.run(async () => ({
        events: await this._backend.getAll(),
        queued: new Set(this._queue.map((pending) => pending.event)),
      }));

      const subscription = this.onEvent((event) => {
        if (queued.delete(event)) {
          return;
        }
        handler(event);
      });

      return { events, subscription };
    });
  }

  // ─── Time travel & merge ────────────────────────────────────────────

  /**
   * Reduce the store to the prefix ending at `target` and re-dispatch it.
   *
   * Walks events in query order up to and including the one whose id
   * equals `target.id`. If none matches, the prefix is every event and
   * the contents are unchanged. Either way the store is cleared and the
   * prefix re-added (sorted), so the callback sees exactly the retained
   * events; callers reset derived state first.
   *
   * @returns whether `target` was found
   */
  async restoreToEvent(target: Event): Promise<boolean> {
    this._assertOpen();
    const targetKey = formatHlc(target.id);

    const { dispatched, result: found } = await this._writeLock.run(async () => {
      const all = await this._backend.getAll();

      const prefix: Event[] = [];
      let found = false;
      for (const event of all) {
        prefix.push(event);
        if (formatHlc(event.id) === targetKey) {
          found = true;
          break;
        }
      }

      this._logger.debug(
        { target: targetKey, found, kept: prefix.length, total: all.length },
        "Restoring to event",
      );

      return this._rewrite(prefix, found);
    });

    await dispatched;
    return found;
  }

  /**
   * Union the persisted events with `events`, deduplicated by id, and
   * re-add the union sorted by id.
   *
   * A persisted event wins over an incoming one with the same id.
   * Idempotent: merging the same set twice leaves the same contents.
   *
   * @returns the number of events in the store afterwards
   */
  async mergeEvents(events: Iterable<Event>): Promise<number> {
    this._assertOpen();

    const { dispatched, result } = await this._writeLock.run(async () => {
      const union = new Map<string, Event>();
      let incoming = 0;
      for (const event of events) {
        union.set(formatHlc(event.id), event);
        incoming++;
      }

      const persisted = await this._backend.getAll();
      for (const event of persisted) {
        union.set(formatHlc(event.id), event);
      }

      this._logger.debug(
        { persisted: persisted.length, incoming, merged: union.size },
        "Merging events",
      );

      return this._rewrite([...union.values()], union.size);
    });

    await dispatched;
    return result;
  }

  // ─── Replay ─────────────────────────────────────────────────────────

  /**
   * Invoke the callback for each event (default: every persisted event)
   * in id order, without writing, queueing or notifying.
   *
   * This is the rebuild primitive: reset derived state first. Stops at
   * and rethrows the first callback failure.
   */
  async replayAll(events?: Iterable<Event>): Promise<void> {
    this._assertOpen();

    const source = events === undefined ? await this.getAll() : [...events];
    const sorted = sortEvents(source);

    await this._dispatchLock.run(async () => {
      for (const event of sorted) {
        await this._processEvent(event);
      }
    });

    this._logger.debug({ count: sorted.length }, "Replayed events");
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Cancel queued events, close the notification channels and release
   * the backend. Idempotent.
   */
  async dispose(): Promise<void> {
    if (this._disposed) {
      return;
    }
    this._disposed = true;

    this._cancelQueued("store disposed");
    this._eventSubscribers.clear();
    this._clearedSubscribers.clear();

    await this._backend.dispose();
    this._logger.debug("Event store disposed");
  }

  /**
   * Resolves once the dispatch loop has emptied the queue.
   */
  async idle(): Promise<void> {
    await this._drainTask;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _assertOpen(): void {
    if (this._disposed) {
      throw new EventStoreError("STORE_CLOSED", "Event store has been disposed");
    }
  }

  /**
   * Clear and re-add `events` sorted. Caller holds the write lock.
   */
  private async _rewrite<T>(events: readonly Event[], result: T): Promise<Enqueued<T>> {
    await this._clear();

    const sorted = sortEvents(events);
    if (sorted.length === 0) {
      return { dispatched: Promise.resolve(), result };
    }

    await this._backend.addAll(sorted);
    return { ...this._enqueue(sorted), result };
  }

  /**
   * Caller holds the write lock.
   */
  private async _clear(): Promise<void> {
    this._cancelQueued("store cleared");
    await this._backend.deleteAll();

    for (const handler of this._clearedSubscribers) {
      try {
        handler();
      } catch (err) {
        this._logger.error({ err }, "onCleared subscriber threw");
      }
    }
  }

  private _cancelQueued(reason: string): void {
    const cancelled = this._queue;
    this._queue = [];

    for (const pending of cancelled) {
      const id = formatHlc(pending.event.id);
      pending.reject(
        new EventStoreError("DISPATCH_CANCELLED", `Dispatch of ${id} cancelled: ${reason}`, id),
      );
    }
  }

  /**
   * Queue events for dispatch. The returned promise settles once every
   * one of them has been dispatched, failed or been cancelled.
   */
  private _enqueue(events: readonly Event[]): Enqueued {
    if (this._disposed) {
      return {
        dispatched: Promise.reject(
          new EventStoreError("STORE_CLOSED", "Event store has been disposed"),
        ),
        result: undefined,
      };
    }

    const completions = events.map(
      (event) =>
        new Promise<void>((resolve, reject) => {
          this._queue.push({ event, resolve, reject });
        }),
    );

    this._scheduleDrain();
    return { dispatched: firstRejection(completions), result: undefined };
  }

  private _scheduleDrain(): void {
    if (this._draining) {
      return;
    }
    this._draining = true;
    this._drainTask = this._dispatchLock.run(() => this._drain());
  }

  /**
   * Dispatch queued events one at a time until the queue is empty.
   * Never rejects: each failure goes to the caller that queued it.
   */
  private async _drain(): Promise<void> {
    try {
      let next = this._queue.shift();
      while (next !== undefined) {
        const { event } = next;
        try {
          await this._processEvent(event);
        } catch (err) {
          this._logger.error(
            { eventId: formatHlc(event.id), type: event.type, err },
            "processEvent failed",
          );
          next.reject(err);
          next = this._queue.shift();
          continue;
        }

        this._notify(event);
        next.resolve();
        next = this._queue.shift();
      }
    } finally {
      this._draining = false;
    }
  }

  private _notify(event: Event): void {
    for (const handler of this._eventSubscribers) {
      try {
        handler(event);
      } catch (err) {
        this._logger.error(
          { eventId: formatHlc(event.id), err },
          "onEvent subscriber threw",
        );
      }
    }
  }
}

/**
 * Wait for every promise to settle, then reject with the first failure.
 */
async function firstRejection(promises: readonly Promise<void>[]): Promise<void> {
  const results = await Promise.allSettled(promises);
  for (const result of results) {
    if (result.status === "rejected") {
      throw result.reason;
    }
  }
}
