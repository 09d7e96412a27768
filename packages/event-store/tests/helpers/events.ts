/**
 * Event fixtures shared by the test suites.
 */

import type { Event, JsonObject } from "@causal-log/types";
import { createEvent } from "../../src/event.js";
import { createHlc } from "../../src/hlc.js";

export function makeEvent(
  physicalTimeMillis: number,
  type = "Increment",
  data: JsonObject = { amount: 1 },
  nodeId = "node1",
  counter = 0,
): Event {
  return createEvent({ id: createHlc(physicalTimeMillis, counter, nodeId), type, data });
}

/** `count` Increment events at 1, 2, 3, ... ms, amount equal to the time */
export function makeEvents(count: number): Event[] {
  return Array.from({ length: count }, (_, i) => makeEvent(i + 1, "Increment", { amount: i + 1 }));
}

export function typesOf(events: readonly Event[]): string[] {
  return events.map((event) => event.type);
}

export function timesOf(events: readonly Event[]): number[] {
  return events.map((event) => event.id.physicalTimeMillis);
}
