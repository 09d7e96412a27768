/**
 * @causal-log/event-store — Causally ordered event log.
 *
 * Provides:
 * - ClockGenerator and helpers for hybrid logical clock identifiers
 * - Immutable events and the record codec shared by every backend
 * - EventStore: persist, dispatch, subscribe, restore, merge, replay
 * - InMemoryBackend, JsonlBackend and SqliteBackend
 * - EventCatalog for closed event unions and schema migration
 * - Projection base classes for derived view state
 * - Environment configuration and pino logging
 *
 * @packageDocumentation
 */

// Core types
export type {
  ProcessEvent,
  EventHandler,
  ClearedHandler,
  Subscription,
  SnapshotSubscription,
  BackendKind,
  EventBackend,
  EventId,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hybrid logical clock
export type { HlcErrorCode, ClockGeneratorOptions } from "./hlc.js";
export {
  HlcError,
  ClockGenerator,
  createHlc,
  compareHlc,
  hlcEquals,
  hlcToDate,
  formatHlc,
  parseHlc,
} from "./hlc.js";

// Events & codec
export type { CreateEventInput } from "./event.js";
export {
  createEvent,
  eventsEqual,
  compareEvents,
  sortEvents,
  toEventRecord,
  fromEventRecord,
  serializeEvent,
  deserializeEvent,
} from "./event.js";

// Store
export type { EventStoreOptions, EventStoreState } from "./event-store.js";
export { EventStore } from "./event-store.js";

// Backends
export { InMemoryBackend } from "./in-memory-backend.js";
export { JsonlBackend } from "./jsonl-backend.js";
export type { JsonlBackendOptions } from "./jsonl-backend.js";
export { SqliteBackend } from "./sqlite-backend.js";
export type { SqliteBackendOptions, SqliteDataType } from "./sqlite-backend.js";
export { betterSqlite3Driver } from "./sqlite-driver.js";
export type { SqlDriver, SqlValue, MaybePromise } from "./sqlite-driver.js";

// Catalog & schema versioning
export type {
  EventBody,
  TypedEvent,
  EventMigration,
  EventCatalogOptions,
} from "./catalog.js";
export {
  EventCatalog,
  CatalogError,
  UnknownEventTypeError,
  assertNever,
} from "./catalog.js";

// Projections
export type { ProjectionOptions, CatalogProjectionOptions } from "./projection.js";
export { Projection, CatalogProjection, useProjection } from "./projection.js";

// Configuration & logging
export type { StoreConfig } from "./config.js";
export {
  ConfigSchema,
  DEFAULT_JSONL_PATH,
  DEFAULT_SQLITE_PATH,
  loadConfig,
  createBackend,
  createClock,
  createConfiguredLogger,
} from "./config.js";
export type { Logger, LogLevel, CreateLoggerOptions } from "./logger.js";
export { createLogger, silentLogger } from "./logger.js";

// Concurrency
export { SerialLock } from "./serial-lock.js";
