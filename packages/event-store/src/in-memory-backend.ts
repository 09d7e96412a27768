/**
 * @causal-log/event-store — In-memory backend.
 *
 * Stores events in a plain array. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - Ephemeral view state
 *
 * Not suitable for production (all state lost on process exit).
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) getAll (copy)
 * - O(1) getById (id index)
 * - No durability guarantees
 */

import type { Event } from "@causal-log/types";
import { formatHlc } from "./hlc.js";
import type { EventBackend } from "./types.js";

/**
 * In-memory event backend.
 *
 * Events live in two structures:
 * - An array in insertion order for getAll
 * - An id → array-index map for lookups and last-write-wins replacement
 */
export class InMemoryBackend implements EventBackend {
  readonly kind = "memory" as const;

  /** Events in insertion order */
  private _log: Event[] = [];

  /** Canonical id → position in _log */
  private readonly _index = new Map<string, number>();

  // ─── Write ──────────────────────────────────────────────────────────

  async add(event: Event): Promise<void> {
    this._put(event);
  }

  async addAll(events: readonly Event[]): Promise<void> {
    for (const event of events) {
      this._put(event);
    }
  }

  async deleteAll(): Promise<void> {
    this._log = [];
    this._index.clear();
  }

  // ─── Read ───────────────────────────────────────────────────────────

  async getAll(): Promise<readonly Event[]> {
    return [...this._log];
  }

  async getById(id: string): Promise<Event | undefined> {
    const position = this._index.get(id);
    return position === undefined ? undefined : this._log[position];
  }

  /** Number of stored events */
  get size(): number {
    return this._log.length;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  async dispose(): Promise<void> {
    // Nothing to release; contents stay readable until garbage collected.
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _put(event: Event): void {
    const key = formatHlc(event.id);
    const existing = this._index.get(key);

    if (existing !== undefined) {
      this._log[existing] = event;
      return;
    }

    this._index.set(key, this._log.length);
    this._log.push(event);
  }
}
