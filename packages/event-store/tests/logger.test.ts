/**
 * Tests for logger.ts.
 */

import { describe, it, expect } from "vitest";
import { createLogger, silentLogger } from "../src/logger.js";

describe("createLogger", () => {
  it("defaults to level info", () => {
    expect(createLogger().level).toBe("info");
  });

  it("honors the requested level", () => {
    expect(createLogger({ level: "debug" }).level).toBe("debug");
  });

  it("children inherit the level", () => {
    expect(createLogger({ level: "warn" }).child({ component: "test" }).level).toBe("warn");
  });
});

describe("silentLogger", () => {
  it("is silent and shared", () => {
    expect(silentLogger().level).toBe("silent");
    expect(silentLogger()).toBe(silentLogger());
  });
});
