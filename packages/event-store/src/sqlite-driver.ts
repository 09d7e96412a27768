/**
 * @causal-log/event-store — SQL driver boundary.
 *
 * The SQLite backend talks to storage only through this interface, so
 * it never depends on a specific engine binding. Methods may be sync
 * or async; the backend awaits every call.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export type SqlValue = string | number | bigint | Buffer | null;

export type MaybePromise<T> = T | Promise<T>;

/**
 * Narrow storage interface required by SqliteBackend.
 */
export interface SqlDriver<THandle> {
  /** Open (or create) the database at `location` */
  open(location: string): MaybePromise<THandle>;

  /** Run a statement that returns no rows */
  execute(handle: THandle, statement: string, params?: readonly SqlValue[]): MaybePromise<void>;

  /** Run a statement and return its rows as column → value records */
  query(handle: THandle, statement: string, params?: readonly SqlValue[]): MaybePromise<readonly unknown[]>;

  /** Close the handle */
  close(handle: THandle): MaybePromise<void>;
}

/**
 * SqlDriver backed by better-sqlite3.
 *
 * `location` is a file path or ":memory:". The parent directory of a
 * file path is created on demand.
 */
export const betterSqlite3Driver: SqlDriver<Database.Database> = {
  open(location) {
    if (location !== ":memory:" && location !== "") {
      mkdirSync(dirname(location), { recursive: true });
    }
    return new Database(location);
  },

  execute(handle, statement, params = []) {
    const stmt = handle.prepare(statement);
    if (stmt.reader) {
      // e.g. "PRAGMA journal_mode=WAL" reports the resulting mode
      stmt.all(...params);
    } else {
      stmt.run(...params);
    }
  },

  query(handle, statement, params = []) {
    return handle.prepare(statement).all(...params);
  },

  close(handle) {
    if (handle.open) {
      handle.close();
    }
  },
};
