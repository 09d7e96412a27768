/**
 * @causal-log/event-store — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod,
 * and builds the configured backend, clock and logger.
 */

import { z } from "zod";
import { ClockGenerator } from "./hlc.js";
import { InMemoryBackend } from "./in-memory-backend.js";
import { JsonlBackend } from "./jsonl-backend.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import { SqliteBackend } from "./sqlite-backend.js";
import { betterSqlite3Driver } from "./sqlite-driver.js";
import type { EventBackend } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  EVENT_STORE_BACKEND: z.enum(["memory", "jsonl", "sqlite"]).default("memory"),
  /** Unset: DEFAULT_JSONL_PATH or DEFAULT_SQLITE_PATH, per backend */
  EVENT_STORE_PATH: z.string().min(1).optional(),
  EVENT_STORE_SQLITE_DATA_TYPE: z.enum(["text", "json", "jsonb"]).default("text"),
  EVENT_STORE_SQLITE_WAL: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
  EVENT_STORE_NODE_ID: z.string().min(1).default("node1"),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_PRETTY: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
});

export const DEFAULT_JSONL_PATH = "./data/events.jsonl";
export const DEFAULT_SQLITE_PATH = "./data/events.db";

export type StoreConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var holds an invalid value
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): StoreConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Build the backend named by EVENT_STORE_BACKEND.
 */
export function createBackend(config: StoreConfig, logger?: Logger): EventBackend {
  switch (config.EVENT_STORE_BACKEND) {
    case "memory":
      return new InMemoryBackend();
    case "jsonl":
      return new JsonlBackend({
        filePath: config.EVENT_STORE_PATH ?? DEFAULT_JSONL_PATH,
        logger,
      });
    case "sqlite":
      return new SqliteBackend({
        driver: betterSqlite3Driver,
        location: config.EVENT_STORE_PATH ?? DEFAULT_SQLITE_PATH,
        dataType: config.EVENT_STORE_SQLITE_DATA_TYPE,
        wal: config.EVENT_STORE_SQLITE_WAL,
        logger,
      });
  }
}

/**
 * Build a clock that stamps EVENT_STORE_NODE_ID on its identifiers.
 */
export function createClock(config: StoreConfig, now?: () => number): ClockGenerator {
  return new ClockGenerator({ nodeId: config.EVENT_STORE_NODE_ID, now });
}

/**
 * Build the root logger at LOG_LEVEL, pretty-printed when LOG_PRETTY is set.
 */
export function createConfiguredLogger(config: StoreConfig): Logger {
  return createLogger({ level: config.LOG_LEVEL, pretty: config.LOG_PRETTY });
}
