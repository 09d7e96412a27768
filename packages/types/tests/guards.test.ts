/**
 * Runtime type guard tests for @causal-log/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isJsonValue,
  isJsonObject,
  isHlc,
  isEvent,
  isEventRecord,
} from "../src/guards.js";
import { HLC_MAX_COUNTER } from "../src/hlc.js";

// =============================================================================
// JSON guards
// =============================================================================

describe("isJsonValue", () => {
  it("accepts primitives", () => {
    expect(isJsonValue(null)).toBe(true);
    expect(isJsonValue("text")).toBe(true);
    expect(isJsonValue(42)).toBe(true);
    expect(isJsonValue(false)).toBe(true);
  });

  it("accepts nested arrays and objects", () => {
    expect(isJsonValue({ list: [1, 2, { deep: "yes" }], flag: true })).toBe(true);
  });

  it("rejects non-finite numbers", () => {
    expect(isJsonValue(Number.NaN)).toBe(false);
    expect(isJsonValue(Number.POSITIVE_INFINITY)).toBe(false);
  });

  it("rejects undefined, functions and bigint", () => {
    expect(isJsonValue(undefined)).toBe(false);
    expect(isJsonValue(() => 1)).toBe(false);
    expect(isJsonValue(10n)).toBe(false);
  });

  it("rejects arrays containing non-JSON values", () => {
    expect(isJsonValue([1, undefined])).toBe(false);
  });
});

describe("isJsonObject", () => {
  it("accepts a plain object", () => {
    expect(isJsonObject({ amount: 1 })).toBe(true);
  });

  it("accepts an empty object", () => {
    expect(isJsonObject({})).toBe(true);
  });

  it("rejects arrays", () => {
    expect(isJsonObject([1, 2])).toBe(false);
  });

  it("rejects class instances", () => {
    expect(isJsonObject(new Date(0))).toBe(false);
    expect(isJsonObject(new Map())).toBe(false);
  });

  it("rejects objects with non-JSON members", () => {
    expect(isJsonObject({ when: new Date(0) })).toBe(false);
  });
});

// =============================================================================
// HLC guards
// =============================================================================

describe("isHlc", () => {
  it("accepts a valid HLC", () => {
    expect(isHlc({ physicalTimeMillis: 100, counter: 0, nodeId: "A" })).toBe(true);
  });

  it("accepts the largest counter", () => {
    expect(isHlc({ physicalTimeMillis: 1, counter: HLC_MAX_COUNTER, nodeId: "A" })).toBe(true);
  });

  it("rejects a counter above uint32", () => {
    expect(isHlc({ physicalTimeMillis: 1, counter: HLC_MAX_COUNTER + 1, nodeId: "A" })).toBe(false);
  });

  it("rejects negative physical time", () => {
    expect(isHlc({ physicalTimeMillis: -1, counter: 0, nodeId: "A" })).toBe(false);
  });

  it("rejects fractional counters", () => {
    expect(isHlc({ physicalTimeMillis: 1, counter: 0.5, nodeId: "A" })).toBe(false);
  });

  it("rejects an empty node id", () => {
    expect(isHlc({ physicalTimeMillis: 1, counter: 0, nodeId: "" })).toBe(false);
  });

  it("rejects the string form", () => {
    expect(isHlc("100:0:A")).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const validEvent = {
  id: { physicalTimeMillis: 100, counter: 0, nodeId: "A" },
  type: "Increment",
  data: { amount: 1 },
  schemaVersion: "1.0.0",
};

describe("isEvent", () => {
  it("accepts a valid event", () => {
    expect(isEvent(validEvent)).toBe(true);
  });

  it("rejects an event with a string id", () => {
    expect(isEvent({ ...validEvent, id: "100:0:A" })).toBe(false);
  });

  it("rejects an empty type", () => {
    expect(isEvent({ ...validEvent, type: "" })).toBe(false);
  });

  it("rejects array payloads", () => {
    expect(isEvent({ ...validEvent, data: [1] })).toBe(false);
  });

  it("rejects a missing schema version", () => {
    const { schemaVersion: _omitted, ...rest } = validEvent;
    expect(isEvent(rest)).toBe(false);
  });

  it("rejects null", () => {
    expect(isEvent(null)).toBe(false);
  });
});

describe("isEventRecord", () => {
  it("accepts a valid record", () => {
    expect(
      isEventRecord({ id: "100:0:A", type: "Increment", data: {}, schemaVersion: "1.0.0" }),
    ).toBe(true);
  });

  it("rejects a record with an HLC object id", () => {
    expect(isEventRecord(validEvent)).toBe(false);
  });

  it("rejects a record whose data is a string", () => {
    expect(
      isEventRecord({ id: "100:0:A", type: "Increment", data: "{}", schemaVersion: "1.0.0" }),
    ).toBe(false);
  });
});
