/**
 * @causal-log/event-store — File-based JSONL backend.
 *
 * Stores events as one JSON record per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before returning
 * - Partial writes (torn lines) are skipped on read, never fatal
 * - An append to a file whose last byte is not "\n" starts a new line
 *   first, so a torn tail cannot swallow the next record
 * - The file is never truncated except by deleteAll
 *
 * Properties:
 * - Durable: events survive process restart
 * - O(1) append (single write + fsync)
 * - O(n) getAll (read and parse every line)
 *
 * File format:
 * {"id":"1700000000000:0:node1","type":"Increment","data":{"amount":1},"schemaVersion":"1.0.0"}
 */

import { createReadStream } from "node:fs";
import { mkdir, open, readFile, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { createInterface } from "node:readline";
import type { Event } from "@causal-log/types";
import { deserializeEvent, serializeEvent } from "./event.js";
import { formatHlc, HlcError } from "./hlc.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { EventBackend } from "./types.js";
import { EventStoreError } from "./types.js";

/**
 * Options for creating a JsonlBackend.
 */
export interface JsonlBackendOptions {
  /** Path to the JSONL file; parent directories are created on demand */
  readonly filePath: string;

  readonly logger?: Logger;
}

const NEWLINE = 0x0a;

/**
 * File-based JSONL event backend.
 *
 * Nothing is cached in memory: every read goes to the file, which is
 * the source of truth.
 */
export class JsonlBackend implements EventBackend {
  readonly kind = "jsonl" as const;

  private readonly _filePath: string;
  private readonly _logger: Logger;
  private _dirReady = false;

  constructor(options: JsonlBackendOptions) {
    this._filePath = options.filePath;
    this._logger = (options.logger ?? silentLogger()).child({
      backend: "jsonl",
      filePath: options.filePath,
    });
  }

  /**
   * Get the file path this backend writes to.
   */
  get filePath(): string {
    return this._filePath;
  }

  // ─── Write ──────────────────────────────────────────────────────────

  async add(event: Event): Promise<void> {
    await this._appendAndSync(serializeEvent(event) + "\n");
  }

  /**
   * Append every event in one write + fsync.
   *
   * Not transactional: a crash mid-write leaves a prefix of the batch
   * followed by at most one torn line.
   */
  async addAll(events: readonly Event[]): Promise<void> {
    if (events.length === 0) {
      return;
    }
    const lines = events.map((event) => serializeEvent(event) + "\n").join("");
    await this._appendAndSync(lines);
  }

  async deleteAll(): Promise<void> {
    await this._ensureDir();
    await writeFile(this._filePath, "", "utf-8");
  }

  // ─── Read ───────────────────────────────────────────────────────────

  /**
   * Read every event in file order.
   *
   * When an id appears more than once, the last record wins but keeps
   * the position of the first.
   */
  async getAll(): Promise<readonly Event[]> {
    let content: string;
    try {
      content = await readFile(this._filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        return [];
      }
      throw err;
    }

    const byId = new Map<string, Event>();
    const lines = content.split("\n");

    for (let i = 0; i < lines.length; i++) {
      const event = this._parseLine(lines[i] ?? "", i + 1);
      if (event !== undefined) {
        byId.set(formatHlc(event.id), event);
      }
    }

    return [...byId.values()];
  }

  /**
   * Stream the file line by line looking for `id`.
   * The whole file is scanned so a later duplicate wins.
   */
  async getById(id: string): Promise<Event | undefined> {
    try {
      await stat(this._filePath);
    } catch (err) {
      if (isNotFound(err)) {
        return undefined;
      }
      throw err;
    }

    const lines = createInterface({
      input: createReadStream(this._filePath, { encoding: "utf-8" }),
      crlfDelay: Infinity,
    });

    let found: Event | undefined;
    let lineNumber = 0;
    for await (const line of lines) {
      lineNumber++;
      const event = this._parseLine(line, lineNumber);
      if (event !== undefined && formatHlc(event.id) === id) {
        found = event;
      }
    }
    return found;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  async dispose(): Promise<void> {
    // Every operation opens and closes its own handle.
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Decode one line. Blank lines and unreadable records yield undefined;
   * unreadable ones are logged.
   */
  private _parseLine(line: string, lineNumber: number): Event | undefined {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      return undefined;
    }

    try {
      return deserializeEvent(trimmed);
    } catch (err) {
      if (err instanceof EventStoreError || err instanceof HlcError) {
        this._logger.warn(
          { line: lineNumber, reason: err.message },
          "Skipping unreadable JSONL record",
        );
        return undefined;
      }
      throw err;
    }
  }

  private async _ensureDir(): Promise<void> {
    if (this._dirReady) {
      return;
    }
    await mkdir(dirname(this._filePath), { recursive: true });
    this._dirReady = true;
  }

  /**
   * Append data to the JSONL file and fsync for durability.
   */
  private async _appendAndSync(data: string): Promise<void> {
    await this._ensureDir();

    const handle = await open(this._filePath, "a+");
    try {
      const { size } = await handle.stat();
      let prefix = "";
      if (size > 0) {
        const tail = Buffer.alloc(1);
        await handle.read(tail, 0, 1, size - 1);
        if (tail[0] !== NEWLINE) {
          this._logger.warn({ size }, "File does not end with a newline; starting a new line");
          prefix = "\n";
        }
      }

      await handle.appendFile(prefix + data, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
