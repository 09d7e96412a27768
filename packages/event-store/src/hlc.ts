/**
 * @causal-log/event-store — Hybrid Logical Clock.
 *
 * Generates and compares causally-ordered identifiers.
 *
 * Ordering:
 * - Physical time dominates, keeping ids close to wall-clock order
 * - The counter orders bursts within the same millisecond
 * - The node id breaks remaining ties deterministically
 *
 * Each ClockGenerator owns its last issued (physical, counter) pair.
 * Nothing here is process-global: producers share a generator by
 * passing it around, and tests construct one with a fake clock.
 */

import type { Hlc } from "@causal-log/types";
import { HLC_MAX_COUNTER } from "@causal-log/types";

// =============================================================================
// Errors
// =============================================================================

export type HlcErrorCode =
  | "MALFORMED_IDENTIFIER"
  | "COUNTER_OVERFLOW"
  | "INVALID_NODE_ID";

/**
 * Error thrown by HLC parsing and generation.
 */
export class HlcError extends Error {
  constructor(
    public readonly code: HlcErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HlcError";
  }
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Build a validated, frozen HLC value.
 *
 * @throws HlcError if any field is out of range
 */
export function createHlc(
  physicalTimeMillis: number,
  counter: number,
  nodeId: string,
): Hlc {
  if (!Number.isSafeInteger(physicalTimeMillis) || physicalTimeMillis < 0) {
    throw new HlcError(
      "MALFORMED_IDENTIFIER",
      `Physical time must be a non-negative integer, got ${physicalTimeMillis}`,
    );
  }
  if (!Number.isInteger(counter) || counter < 0 || counter > HLC_MAX_COUNTER) {
    throw new HlcError(
      "MALFORMED_IDENTIFIER",
      `Counter must be an unsigned 32-bit integer, got ${counter}`,
    );
  }
  if (nodeId.length === 0) {
    throw new HlcError("INVALID_NODE_ID", "Node ID must be a non-empty string");
  }
  return Object.freeze({ physicalTimeMillis, counter, nodeId });
}

// =============================================================================
// Generator
// =============================================================================

export interface ClockGeneratorOptions {
  /** Node id used when `now()` is called without one. Default: "node1" */
  readonly nodeId?: string;

  /** Physical clock in epoch milliseconds. Default: Date.now */
  readonly now?: () => number;

  /**
   * Last identifier issued before this generator existed, e.g. the
   * newest persisted id after a restart. Every id issued sorts after it.
   */
  readonly seed?: Hlc;
}

/**
 * Issues monotonically increasing HLCs, even when the physical clock
 * moves backwards.
 */
export class ClockGenerator {
  private readonly _defaultNodeId: string;
  private readonly _now: () => number;

  private _lastPhysical = 0;
  private _lastCounter = 0;
  private _issued = false;

  constructor(options: ClockGeneratorOptions = {}) {
    this._defaultNodeId = options.nodeId ?? "node1";
    this._now = options.now ?? Date.now;

    if (this._defaultNodeId.length === 0) {
      throw new HlcError("INVALID_NODE_ID", "Node ID must be a non-empty string");
    }

    if (options.seed !== undefined) {
      this._lastPhysical = options.seed.physicalTimeMillis;
      this._lastCounter = options.seed.counter;
      this._issued = true;
    }
  }

  /** Node id stamped on identifiers when none is given */
  get nodeId(): string {
    return this._defaultNodeId;
  }

  /**
   * Issue the next identifier.
   *
   * If the physical clock has advanced past the last issued time, the
   * counter restarts at 0. Otherwise the last time is kept and the
   * counter is incremented.
   *
   * @throws HlcError("COUNTER_OVERFLOW") if the counter would exceed uint32
   */
  now(nodeId: string = this._defaultNodeId): Hlc {
    const pt = Math.floor(this._now());

    let physical: number;
    let counter: number;

    if (!this._issued || pt > this._lastPhysical) {
      physical = pt;
      counter = 0;
    } else {
      if (this._lastCounter >= HLC_MAX_COUNTER) {
        throw new HlcError(
          "COUNTER_OVERFLOW",
          `HLC counter exhausted at physical time ${this._lastPhysical}`,
        );
      }
      physical = this._lastPhysical;
      counter = this._lastCounter + 1;
    }

    const hlc = createHlc(physical, counter, nodeId);

    this._lastPhysical = physical;
    this._lastCounter = counter;
    this._issued = true;

    return hlc;
  }

  /**
   * The last identifier this generator issued, without node id.
   * Useful for debugging clock drift.
   */
  get last(): { readonly physicalTimeMillis: number; readonly counter: number } | undefined {
    if (!this._issued) {
      return undefined;
    }
    return { physicalTimeMillis: this._lastPhysical, counter: this._lastCounter };
  }
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Total order over HLCs: physical time, then counter, then node id
 * (compared by UTF-16 code unit, never locale).
 */
export function compareHlc(a: Hlc, b: Hlc): -1 | 0 | 1 {
  if (a.physicalTimeMillis !== b.physicalTimeMillis) {
    return a.physicalTimeMillis < b.physicalTimeMillis ? -1 : 1;
  }
  if (a.counter !== b.counter) {
    return a.counter < b.counter ? -1 : 1;
  }
  if (a.nodeId !== b.nodeId) {
    return a.nodeId < b.nodeId ? -1 : 1;
  }
  return 0;
}

export function hlcEquals(a: Hlc, b: Hlc): boolean {
  return compareHlc(a, b) === 0;
}

/**
 * Wall-clock instant of an HLC's physical component.
 */
export function hlcToDate(hlc: Hlc): Date {
  return new Date(hlc.physicalTimeMillis);
}

// =============================================================================
// Canonical string form
// =============================================================================

const HLC_PATTERN = /^(\d+):(\d+):([\s\S]+)$/;

export function formatHlc(hlc: Hlc): string {
  return `${hlc.physicalTimeMillis}:${hlc.counter}:${hlc.nodeId}`;
}

/**
 * Parse the canonical "time:counter:node" form.
 *
 * The node id is everything after the second separator and may itself
 * contain ":" or line terminators.
 *
 * @throws HlcError("MALFORMED_IDENTIFIER") for any other shape
 */
export function parseHlc(value: string): Hlc {
  const match = HLC_PATTERN.exec(value);
  if (match === null) {
    throw new HlcError(
      "MALFORMED_IDENTIFIER",
      `Malformed HLC "${value}", expected "<physicalTime>:<counter>:<nodeId>"`,
    );
  }

  const [, physical = "", counter = "", nodeId = ""] = match;

  try {
    return createHlc(Number(physical), Number(counter), nodeId);
  } catch (err) {
    if (err instanceof HlcError) {
      throw new HlcError("MALFORMED_IDENTIFIER", `Malformed HLC "${value}": ${err.message}`);
    }
    throw err;
  }
}
