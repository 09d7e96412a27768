/**
 * @causal-log/event-store — Event Catalog & Schema Versioning.
 *
 * Turns the open-ended `Event` (any type string, any JSON payload) into
 * the closed tagged union of one domain:
 * - A zod discriminated union on `type` defines every known event
 * - Decoding validates the payload and yields a typed event that a
 *   projection can `switch` over exhaustively
 * - Schema versions are tracked per type, with migration hooks that
 *   upcast stored payloads at read time (stored events are never rewritten)
 *
 * Usage:
 * ```ts
 * const catalog = new EventCatalog(
 *   z.discriminatedUnion("type", [
 *     z.object({ type: z.literal("Increment"), data: z.object({ amount: z.number() }) }),
 *     z.object({ type: z.literal("Reset"), data: z.object({}) }),
 *   ]),
 *   { versions: { Increment: "2.0.0" } },
 * );
 *
 * catalog.registerMigration("Increment", "1.0.0", "2.0.0", (data) => ({
 *   amount: typeof data.value === "number" ? data.value : 1,
 * }));
 *
 * const event = catalog.decode(stored);
 * switch (event.type) {
 *   case "Increment": total += event.data.amount; break;
 *   case "Reset": total = 0; break;
 *   default: assertNever(event);
 * }
 * ```
 */

import { z } from "zod";
import type { Event, Hlc, JsonObject } from "@causal-log/types";
import { DEFAULT_SCHEMA_VERSION } from "@causal-log/types";
import { createEvent } from "./event.js";
import { formatHlc } from "./hlc.js";

// =============================================================================
// Types
// =============================================================================

/**
 * The part of an event a catalog validates.
 */
export interface EventBody {
  readonly type: string;
  readonly data: JsonObject;
}

/**
 * A decoded event of the catalog's closed union.
 */
export type TypedEvent<TBody extends EventBody> = TBody & {
  readonly id: Hlc;
  readonly schemaVersion: string;
};

/**
 * Transforms a payload from one schema version to the next.
 */
export type EventMigration = (data: JsonObject) => JsonObject;

export interface EventCatalogOptions<TType extends string> {
  /** Current schema version per type. Unlisted types: "1.0.0" */
  readonly versions?: Partial<Record<TType, string>>;
}

interface MigrationStep {
  readonly toVersion: string;
  readonly migrate: EventMigration;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error thrown by catalog operations: invalid payloads and broken
 * migration chains.
 */
export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly eventType?: string,
  ) {
    super(message);
    this.name = "CatalogError";
  }
}

/**
 * An event whose type is outside the catalog's closed set.
 *
 * Fatal and never retried: it propagates out of add/addAll/replayAll.
 */
export class UnknownEventTypeError extends Error {
  constructor(public readonly eventType: string) {
    super(`Unknown event type: ${eventType}`);
    this.name = "UnknownEventTypeError";
  }
}

// =============================================================================
// Event Catalog
// =============================================================================

export class EventCatalog<TBody extends EventBody> {
  private readonly _schema: z.ZodType<TBody, z.ZodTypeDef, unknown>;
  private readonly _versions: ReadonlyMap<string, string>;

  /** type → fromVersion → step */
  private readonly _migrations = new Map<string, Map<string, MigrationStep>>();

  constructor(
    schema: z.ZodType<TBody, z.ZodTypeDef, unknown>,
    options: EventCatalogOptions<TBody["type"]> = {},
  ) {
    this._schema = schema;

    const versions = new Map<string, string>();
    for (const [type, version] of Object.entries(options.versions ?? {})) {
      if (typeof version === "string") {
        versions.set(type, version);
      }
    }
    this._versions = versions;
  }

  /**
   * Register a migration that upcasts `type` payloads from one version
   * to another.
   *
   * @throws CatalogError if a migration from `fromVersion` already exists
   */
  registerMigration(
    type: TBody["type"],
    fromVersion: string,
    toVersion: string,
    migrate: EventMigration,
  ): void {
    if (fromVersion === toVersion) {
      throw new CatalogError(`Migration for "${type}" must change the version`, type);
    }

    let steps = this._migrations.get(type);
    if (steps === undefined) {
      steps = new Map();
      this._migrations.set(type, steps);
    }

    if (steps.has(fromVersion)) {
      throw new CatalogError(
        `Migration for "${type}" from version ${fromVersion} is already registered`,
        type,
      );
    }
    steps.set(fromVersion, { toVersion, migrate });
  }

  /**
   * Current schema version of `type`.
   */
  versionOf(type: string): string {
    return this._versions.get(type) ?? DEFAULT_SCHEMA_VERSION;
  }

  /**
   * Known event types, sorted. Available when the schema is a
   * discriminated union; empty otherwise.
   */
  listTypes(): readonly string[] {
    if (!(this._schema instanceof z.ZodDiscriminatedUnion)) {
      return [];
    }
    const types: string[] = [];
    for (const key of this._schema.optionsMap.keys()) {
      if (typeof key === "string") {
        types.push(key);
      }
    }
    return types.sort();
  }

  has(type: string): boolean {
    return this.listTypes().includes(type);
  }

  /**
   * Upcast a payload from `fromVersion` to the current version of `type`.
   *
   * @throws CatalogError if the chain of migrations is incomplete or loops
   */
  migrate(type: string, data: JsonObject, fromVersion: string): JsonObject {
    const target = this.versionOf(type);
    const steps = this._migrations.get(type);

    let current = data;
    let version = fromVersion;
    const visited = new Set<string>();

    while (version !== target) {
      if (visited.has(version)) {
        throw new CatalogError(`Migration cycle for "${type}" at version ${version}`, type);
      }
      visited.add(version);

      const step = steps?.get(version);
      if (step === undefined) {
        throw new CatalogError(
          `Missing migration for "${type}" from version ${version} to ${target}`,
          type,
        );
      }
      current = step.migrate(current);
      version = step.toVersion;
    }

    return current;
  }

  /**
   * Decode a stored event into the catalog's typed union.
   *
   * @throws UnknownEventTypeError if the type is not in the catalog
   * @throws CatalogError if the (upcast) payload fails validation
   */
  decode(event: Event): TypedEvent<TBody> {
    const known = this.listTypes();
    if (known.length > 0 && !known.includes(event.type)) {
      throw new UnknownEventTypeError(event.type);
    }

    const data = this.migrate(event.type, event.data, event.schemaVersion);
    const parsed = this._schema.safeParse({ type: event.type, data });

    if (!parsed.success) {
      const unknownType = parsed.error.issues.some(
        (issue) => issue.code === z.ZodIssueCode.invalid_union_discriminator,
      );
      if (unknownType) {
        throw new UnknownEventTypeError(event.type);
      }
      throw new CatalogError(
        `Invalid payload for "${event.type}" (${formatHlc(event.id)}): ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`,
        event.type,
      );
    }

    return {
      ...parsed.data,
      id: event.id,
      schemaVersion: this.versionOf(event.type),
    };
  }

  /**
   * Build a validated event stamped with the current schema version.
   */
  create<K extends TBody["type"]>(
    type: K,
    data: Extract<TBody, { readonly type: K }>["data"],
    id: Hlc,
  ): Event<K> {
    const parsed = this._schema.safeParse({ type, data });
    if (!parsed.success) {
      throw new CatalogError(
        `Invalid payload for "${type}": ${parsed.error.issues.map((i) => i.message).join("; ")}`,
        type,
      );
    }

    return createEvent({
      id,
      type,
      data: parsed.data.data,
      schemaVersion: this.versionOf(type),
    });
  }
}

/**
 * Exhaustiveness check for `switch` statements over a catalog union.
 * Unreachable when every case is handled; throws if an unknown type
 * slips through at run time.
 */
export function assertNever(value: never): never {
  const received: unknown = value;
  const type =
    typeof received === "object" && received !== null && "type" in received
      ? received.type
      : received;
  throw new UnknownEventTypeError(String(type));
}
