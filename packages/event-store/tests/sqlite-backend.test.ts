/**
 * Tests for SqliteBackend over better-sqlite3.
 *
 * Verifies:
 * - The shared backend contract, in every payload column mode
 * - Upsert: a duplicate id leaves a single row
 * - Column storage per mode (TEXT vs BLOB)
 * - Transactions: a failing batch rolls back entirely
 * - Lifecycle: lazy open, persistence on disk, closed after dispose
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type Database from "better-sqlite3";
import { pino } from "pino";
import { eventsEqual } from "../src/event.js";
import type { SqliteDataType } from "../src/sqlite-backend.js";
import { SqliteBackend } from "../src/sqlite-backend.js";
import type { SqlDriver } from "../src/sqlite-driver.js";
import { betterSqlite3Driver } from "../src/sqlite-driver.js";
import { EventStoreError } from "../src/types.js";
import { describeBackendContract } from "./helpers/backend-contract.js";
import { makeEvent, timesOf } from "./helpers/events.js";

// =============================================================================
// Helpers
// =============================================================================

interface RecordingDriver extends SqlDriver<Database.Database> {
  readonly statements: string[];
  readonly handles: Database.Database[];
}

/**
 * better-sqlite3 driver that records statements and can fail on demand.
 */
function recordingDriver(
  options: {
    failInsertAt?: number;
    failRollback?: boolean;
    failOpens?: number;
    failCreateTable?: number;
  } = {},
): RecordingDriver {
  const statements: string[] = [];
  const handles: Database.Database[] = [];
  let inserts = 0;
  let opens = 0;
  let creates = 0;

  return {
    statements,
    handles,
    open(location) {
      opens++;
      if (opens <= (options.failOpens ?? 0)) {
        throw new Error("transient open failure");
      }
      const handle = betterSqlite3Driver.open(location);
      if (handle instanceof Promise) {
        throw new Error("better-sqlite3 opens synchronously");
      }
      handles.push(handle);
      return handle;
    },
    execute(handle, statement, params) {
      statements.push(statement);
      if (statement.startsWith("INSERT")) {
        inserts++;
        if (inserts === options.failInsertAt) {
          throw new Error("disk I/O error");
        }
      }
      if (statement.startsWith("CREATE TABLE")) {
        creates++;
        if (creates <= (options.failCreateTable ?? 0)) {
          throw new Error("cannot create table");
        }
      }
      if (statement === "ROLLBACK" && options.failRollback === true) {
        throw new Error("cannot rollback");
      }
      return betterSqlite3Driver.execute(handle, statement, params);
    },
    query(handle, statement, params) {
      statements.push(statement);
      return betterSqlite3Driver.query(handle, statement, params);
    },
    close(handle) {
      return betterSqlite3Driver.close(handle);
    },
  };
}

const DATA_TYPES: readonly SqliteDataType[] = ["text", "json", "jsonb"];

for (const dataType of DATA_TYPES) {
  describeBackendContract(
    `SqliteBackend (${dataType})`,
    () => new SqliteBackend({ driver: betterSqlite3Driver, location: ":memory:", dataType }),
  );
}

// =============================================================================
// SQLite specifics
// =============================================================================

describe("SqliteBackend", () => {
  it("reports kind and data type", () => {
    const backend = new SqliteBackend({ driver: betterSqlite3Driver, location: ":memory:" });
    expect(backend.kind).toBe("sqlite");
    expect(backend.dataType).toBe("text");
  });

  it("does not open the database until first use", async () => {
    const driver = recordingDriver();
    const backend = new SqliteBackend({ driver, location: ":memory:" });
    await backend.dispose();

    expect(driver.handles).toHaveLength(0);
    expect(driver.statements).toEqual([]);
  });

  it("keeps one row for a duplicate id", async () => {
    const backend = new SqliteBackend({ driver: betterSqlite3Driver, location: ":memory:" });
    await backend.add(makeEvent(1, "Increment", { amount: 1 }));
    await backend.add(makeEvent(1, "Increment", { amount: 5 }));

    expect(await backend.count()).toBe(1);
    expect((await backend.getById("1:0:node1"))?.data).toEqual({ amount: 5 });
    await backend.dispose();
  });

  const storage: Array<[SqliteDataType, string]> = [
    ["text", "text"],
    ["json", "text"],
    ["jsonb", "blob"],
  ];

  it.each(storage)("stores %s payloads as %s", async (dataType, columnType) => {
    const driver = recordingDriver();
    const backend = new SqliteBackend({ driver, location: ":memory:", dataType });
    const event = makeEvent(1, "Put", { key: "k", value: [1, { deep: true }] });
    await backend.add(event);

    const [handle] = driver.handles;
    expect(handle?.prepare("SELECT typeof(data) AS t FROM events").get()).toEqual({ t: columnType });

    const [stored] = await backend.getAll();
    expect(stored !== undefined && eventsEqual(stored, event)).toBe(true);
    await backend.dispose();
  });

  it("reads rows with a missing schema version as 1.0.0", async () => {
    const driver = recordingDriver();
    const backend = new SqliteBackend({ driver, location: ":memory:" });
    await backend.count();

    driver.handles[0]
      ?.prepare("INSERT INTO events (id, type, data, schema_version) VALUES (?, ?, ?, NULL)")
      .run("9:0:legacy", "Increment", '{"amount":3}');

    const event = await backend.getById("9:0:legacy");
    expect(event?.schemaVersion).toBe("1.0.0");
    expect(event?.data).toEqual({ amount: 3 });
    await backend.dispose();
  });

  // ─── Transactions ──────────────────────────────────────────────────

  it("rolls back the whole batch when one insert fails", async () => {
    const driver = recordingDriver({ failInsertAt: 3 });
    const backend = new SqliteBackend({ driver, location: ":memory:" });
    await backend.add(makeEvent(1));

    await expect(backend.addAll([makeEvent(2), makeEvent(3), makeEvent(4)])).rejects.toThrow(
      "disk I/O error",
    );

    expect(timesOf(await backend.getAll())).toEqual([1]);
    expect(driver.statements).toContain("ROLLBACK");
    expect(driver.statements).not.toContain("COMMIT");
    await backend.dispose();
  });

  it("rethrows the original error when ROLLBACK also fails", async () => {
    const records: Record<string, unknown>[] = [];
    const logger = pino(
      { level: "error" },
      {
        write(line: string) {
          const parsed: unknown = JSON.parse(line);
          if (typeof parsed === "object" && parsed !== null) {
            records.push({ ...parsed });
          }
        },
      },
    );
    const driver = recordingDriver({ failInsertAt: 1, failRollback: true });
    const backend = new SqliteBackend({ driver, location: ":memory:", logger });

    await expect(backend.addAll([makeEvent(1)])).rejects.toThrow("disk I/O error");
    expect(records.map((r) => r["msg"])).toEqual(["ROLLBACK failed"]);

    await backend.dispose();
  });

  it("commits a batch in one transaction", async () => {
    const driver = recordingDriver();
    const backend = new SqliteBackend({ driver, location: ":memory:" });
    await backend.addAll([makeEvent(1), makeEvent(2)]);

    const tx = driver.statements.filter((s) => s === "BEGIN" || s === "COMMIT");
    expect(tx).toEqual(["BEGIN", "COMMIT"]);
    expect(await backend.count()).toBe(2);
    await backend.dispose();
  });

  // ─── Lifecycle ─────────────────────────────────────────────────────

  describe("on disk", () => {
    let testDir: string;

    beforeEach(() => {
      testDir = join(
        tmpdir(),
        `causal-log-sqlite-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
      );
      mkdirSync(testDir, { recursive: true });
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it("persists across reopen, with WAL enabled", async () => {
      const location = join(testDir, "events.db");
      const first = new SqliteBackend({ driver: betterSqlite3Driver, location, wal: true });
      await first.addAll([makeEvent(2), makeEvent(1)]);
      await first.dispose();

      const second = new SqliteBackend({ driver: betterSqlite3Driver, location, wal: true });
      expect(timesOf(await second.getAll())).toEqual([2, 1]);
      await second.dispose();
    });
  });

  it("retries the open after a failed first attempt", async () => {
    const driver = recordingDriver({ failOpens: 1 });
    const backend = new SqliteBackend({ driver, location: ":memory:" });

    await expect(backend.getAll()).rejects.toThrow("transient open failure");
    await backend.add(makeEvent(1));

    expect(timesOf(await backend.getAll())).toEqual([1]);
    expect(driver.handles).toHaveLength(1);
    await backend.dispose();
  });

  it("closes the handle when table setup fails, then retries", async () => {
    const driver = recordingDriver({ failCreateTable: 1 });
    const backend = new SqliteBackend({ driver, location: ":memory:" });

    await expect(backend.count()).rejects.toThrow("cannot create table");
    expect(driver.handles[0]?.open).toBe(false);

    expect(await backend.count()).toBe(0);
    expect(driver.handles).toHaveLength(2);
    expect(driver.handles[1]?.open).toBe(true);
    await backend.dispose();
  });

  it("disposes cleanly after a failed open", async () => {
    const driver = recordingDriver({ failOpens: 1 });
    const backend = new SqliteBackend({ driver, location: ":memory:" });

    await expect(backend.getAll()).rejects.toThrow("transient open failure");
    await expect(backend.dispose()).resolves.toBeUndefined();
  });

  it("rejects use after dispose with STORE_CLOSED", async () => {
    const driver = recordingDriver();
    const backend = new SqliteBackend({ driver, location: ":memory:" });
    await backend.add(makeEvent(1));
    await backend.dispose();

    expect(driver.handles[0]?.open).toBe(false);
    await expect(backend.getAll()).rejects.toBeInstanceOf(EventStoreError);
    await expect(backend.add(makeEvent(2))).rejects.toMatchObject({ code: "STORE_CLOSED" });
  });
});
