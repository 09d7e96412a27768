/**
 * @causal-log/event-store — Logging.
 *
 * Structured JSON logging via pino. Stores and backends take an
 * optional Logger and fall back to a silent one, so embedding the
 * library never writes to stdout unless asked to.
 */

import { pino } from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface CreateLoggerOptions {
  readonly level?: LogLevel;

  /** Logger name, emitted as the `name` field. Default: "causal-log" */
  readonly name?: string;

  /** Pretty-print via pino-pretty (development only) */
  readonly pretty?: boolean;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "causal-log",
    level: options.level ?? "info",
    ...(options.pretty === true
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

const SILENT = pino({ level: "silent" });

/**
 * The logger used when a caller supplies none.
 */
export function silentLogger(): Logger {
  return SILENT;
}
