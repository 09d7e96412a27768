/**
 * Hybrid Logical Clock Types
 *
 * An HLC pairs a physical wall-clock reading with a logical counter and
 * the id of the node that issued it. Together the three fields give a
 * strict total order over identifiers issued by independent producers.
 *
 * Canonical string form: "<physicalTimeMillis>:<counter>:<nodeId>"
 */

export interface Hlc {
  /** Milliseconds since the Unix epoch (non-negative integer) */
  readonly physicalTimeMillis: number;

  /** Logical counter within one millisecond (unsigned 32-bit) */
  readonly counter: number;

  /** Issuing node; breaks ties between producers deterministically */
  readonly nodeId: string;
}

/** Largest counter value an HLC may carry */
export const HLC_MAX_COUNTER = 0xffffffff;
