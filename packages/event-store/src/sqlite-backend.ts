/**
 * @causal-log/event-store — SQLite backend.
 *
 * Stores events in a single table:
 *
 *   events(id TEXT PRIMARY KEY, type TEXT, data TEXT|BLOB, schema_version TEXT DEFAULT '1.0.0')
 *
 * Properties:
 * - Durable and transactional
 * - O(1) upsert keyed by id; a second write with the same id replaces
 *   the row in place (last write wins, row position kept)
 * - addAll runs in one transaction and rolls back entirely on failure
 * - getAll scans the table in rowid (insertion) order
 *
 * Payload column modes (construction option, not a runtime switch):
 * - "text":  plain JSON text, works on every SQLite version
 * - "json":  JSON text validated on insert with json()
 * - "jsonb": binary JSONB blob (SQLite 3.45+), read back through json()
 */

import { z } from "zod";
import type { Event } from "@causal-log/types";
import { fromEventRecord } from "./event.js";
import { formatHlc } from "./hlc.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { SerialLock } from "./serial-lock.js";
import type { SqlDriver, SqlValue } from "./sqlite-driver.js";
import type { EventBackend } from "./types.js";
import { EventStoreError } from "./types.js";

export type SqliteDataType = "text" | "json" | "jsonb";

/**
 * Options for creating a SqliteBackend.
 */
export interface SqliteBackendOptions<THandle> {
  /** Storage binding, e.g. betterSqlite3Driver */
  readonly driver: SqlDriver<THandle>;

  /** Database location passed to driver.open (path or ":memory:") */
  readonly location: string;

  /** Payload column mode. Default: "text" */
  readonly dataType?: SqliteDataType;

  /** Enable write-ahead logging. Default: false */
  readonly wal?: boolean;

  readonly logger?: Logger;
}

const RowSchema = z.object({
  id: z.string(),
  type: z.string(),
  data: z.string().nullable(),
  schema_version: z.string().nullable(),
});

const CountSchema = z.object({ count: z.number() });

/**
 * SQLite event backend.
 *
 * The database is opened lazily on first use, so constructing and
 * immediately disposing a backend never touches storage.
 */
export class SqliteBackend<THandle> implements EventBackend {
  readonly kind = "sqlite" as const;

  private readonly _driver: SqlDriver<THandle>;
  private readonly _location: string;
  private readonly _dataType: SqliteDataType;
  private readonly _wal: boolean;
  private readonly _logger: Logger;

  /** Serializes statements on the shared handle, so reads never see an open batch */
  private readonly _lock = new SerialLock();

  private _handle: Promise<THandle> | undefined;
  private _disposed = false;

  constructor(options: SqliteBackendOptions<THandle>) {
    this._driver = options.driver;
    this._location = options.location;
    this._dataType = options.dataType ?? "text";
    this._wal = options.wal ?? false;
    this._logger = (options.logger ?? silentLogger()).child({
      backend: "sqlite",
      location: options.location,
    });
  }

  get dataType(): SqliteDataType {
    return this._dataType;
  }

  // ─── Write ──────────────────────────────────────────────────────────

  async add(event: Event): Promise<void> {
    await this._lock.run(async () => {
      const db = await this._db();
      await this._driver.execute(db, this._upsertSql(), this._params(event));
    });
  }

  /**
   * Upsert every event inside one transaction.
   * Any failure rolls back the whole batch and is rethrown.
   */
  async addAll(events: readonly Event[]): Promise<void> {
    if (events.length === 0) {
      return;
    }

    await this._lock.run(async () => {
      const db = await this._db();
      const sql = this._upsertSql();

      await this._driver.execute(db, "BEGIN");
      try {
        for (const event of events) {
          await this._driver.execute(db, sql, this._params(event));
        }
        await this._driver.execute(db, "COMMIT");
      } catch (err) {
        this._logger.warn(
          { count: events.length, reason: err instanceof Error ? err.message : String(err) },
          "Rolling back batch insert",
        );
        try {
          await this._driver.execute(db, "ROLLBACK");
        } catch (rollbackErr) {
          this._logger.error({ err: rollbackErr }, "ROLLBACK failed");
        }
        throw err;
      }
    });
  }

  async deleteAll(): Promise<void> {
    await this._lock.run(async () => {
      const db = await this._db();
      await this._driver.execute(db, "DELETE FROM events");
    });
  }

  // ─── Read ───────────────────────────────────────────────────────────

  async getAll(): Promise<readonly Event[]> {
    return this._lock.run(async () => {
      const db = await this._db();
      const rows = await this._driver.query(
        db,
        `SELECT ${this._columns()} FROM events ORDER BY rowid`,
      );
      return rows.map((row) => this._toEvent(row));
    });
  }

  async getById(id: string): Promise<Event | undefined> {
    return this._lock.run(async () => {
      const db = await this._db();
      const [row] = await this._driver.query(
        db,
        `SELECT ${this._columns()} FROM events WHERE id = ?`,
        [id],
      );
      return row === undefined ? undefined : this._toEvent(row);
    });
  }

  /** Number of rows in the events table */
  async count(): Promise<number> {
    return this._lock.run(async () => {
      const db = await this._db();
      const [row] = await this._driver.query(db, "SELECT COUNT(*) AS count FROM events");
      return CountSchema.parse(row).count;
    });
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Close the database handle. Idempotent; a backend that was never
   * used has nothing to close.
   */
  async dispose(): Promise<void> {
    if (this._disposed) {
      return;
    }
    this._disposed = true;

    const pending = this._handle;
    this._handle = undefined;
    if (pending === undefined) {
      return;
    }

    // Statements already queued on the lock finish first.
    await this._lock.run(async () => {
      let db: THandle;
      try {
        db = await pending;
      } catch (err) {
        this._logger.debug({ err }, "SQLite handle never opened, nothing to close");
        return;
      }
      await this._driver.close(db);
    });
    this._logger.debug("SQLite handle closed");
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _db(): Promise<THandle> {
    if (this._disposed) {
      return Promise.reject(
        new EventStoreError("STORE_CLOSED", "SqliteBackend has been disposed"),
      );
    }
    if (this._handle === undefined) {
      // A failed open is not cached; the next call tries again.
      this._handle = this._open().catch((err: unknown) => {
        this._handle = undefined;
        throw err;
      });
    }
    return this._handle;
  }

  private async _open(): Promise<THandle> {
    const db = await this._driver.open(this._location);

    try {
      if (this._wal) {
        await this._driver.execute(db, "PRAGMA journal_mode=WAL");
      }

      const dataColumnType = this._dataType === "jsonb" ? "BLOB" : "TEXT";
      await this._driver.execute(
        db,
        `CREATE TABLE IF NOT EXISTS events (
          id TEXT PRIMARY KEY,
          type TEXT NOT NULL,
          data ${dataColumnType},
          schema_version TEXT DEFAULT '1.0.0'
        )`,
      );
    } catch (err) {
      this._logger.warn(
        { reason: err instanceof Error ? err.message : String(err) },
        "SQLite setup failed, closing handle",
      );
      try {
        await this._driver.close(db);
      } catch (closeErr) {
        this._logger.error({ err: closeErr }, "Closing handle after failed setup failed");
      }
      throw err;
    }

    this._logger.debug({ dataType: this._dataType, wal: this._wal }, "SQLite events table ready");
    return db;
  }

  private _upsertSql(): string {
    const value =
      this._dataType === "text" ? "?" : this._dataType === "json" ? "json(?)" : "jsonb(?)";
    return (
      `INSERT INTO events (id, type, data, schema_version) VALUES (?, ?, ${value}, ?) ` +
      "ON CONFLICT(id) DO UPDATE SET " +
      "type = excluded.type, data = excluded.data, schema_version = excluded.schema_version"
    );
  }

  private _columns(): string {
    const data = this._dataType === "text" ? "data" : "json(data) AS data";
    return `id, type, ${data}, schema_version`;
  }

  private _params(event: Event): SqlValue[] {
    return [formatHlc(event.id), event.type, JSON.stringify(event.data), event.schemaVersion];
  }

  private _toEvent(row: unknown): Event {
    const parsed = RowSchema.parse(row);
    return fromEventRecord({
      id: parsed.id,
      type: parsed.type,
      data: parsed.data,
      schemaVersion: parsed.schema_version ?? undefined,
    });
  }
}
