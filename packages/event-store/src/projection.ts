/**
 * @causal-log/event-store — Projections.
 *
 * A projection derives query-optimized state from the event log. The
 * state is a pure function of the store's contents, built incrementally
 * by `onEvent` and rebuilt from scratch by reset + replay.
 *
 * The projection owns its state and composes an EventStore (the store
 * never owns the projection); only `onEvent` and `onReset` change the
 * state.
 */

import type { Event } from "@causal-log/types";
import type { EventBody, EventCatalog, TypedEvent } from "./catalog.js";
import { EventStore } from "./event-store.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { EventBackend } from "./types.js";

export interface ProjectionOptions<TState> {
  /** Persistence for the projection's own event store */
  readonly backend: EventBackend;

  /** Zero value of the derived state; called on construction and on every reset */
  readonly initialState: () => TState;

  readonly logger?: Logger;
}

/**
 * Base class for view state derived from an event log.
 *
 * ```ts
 * class Counter extends Projection<number> {
 *   constructor(backend: EventBackend) {
 *     super({ backend, initialState: () => 0 });
 *   }
 *   onEvent(event: Event): void {
 *     this.setState(this.state + Number(event.data.amount));
 *   }
 * }
 * ```
 */
export abstract class Projection<TState> {
  readonly eventStore: EventStore;
  protected readonly logger: Logger;

  private readonly _initialState: () => TState;
  private _state: TState;

  constructor(options: ProjectionOptions<TState>) {
    this._initialState = options.initialState;
    this._state = options.initialState();
    this.logger = (options.logger ?? silentLogger()).child({
      projection: new.target.name,
    });

    this.eventStore = new EventStore({
      backend: options.backend,
      processEvent: (event) => this.onEvent(event),
      logger: options.logger,
    });
  }

  /** Current derived state */
  get state(): TState {
    return this._state;
  }

  protected setState(next: TState): void {
    this._state = next;
  }

  /**
   * Apply one event to the derived state.
   *
   * Implementations dispatch on `event.type` over a closed set; an
   * unrecognized type must throw (see CatalogProjection).
   */
  abstract onEvent(event: Event): void | Promise<void>;

  /**
   * Return the derived state to its zero value. Called before every
   * full replay.
   */
  onReset(): void | Promise<void> {
    this._state = this._initialState();
  }

  /**
   * Reset, then reduce the store to the prefix ending at `event` and
   * replay that prefix through onEvent.
   *
   * @returns whether `event` was found in the store
   */
  async restoreToEvent(event: Event): Promise<boolean> {
    await this.onReset();
    return this.eventStore.restoreToEvent(event);
  }

  /**
   * Reset, then merge `events` into the store; the re-dispatched union
   * rebuilds the state from zero.
   *
   * @returns the number of events in the store afterwards
   */
  async mergeEvents(events: Iterable<Event>): Promise<number> {
    await this.onReset();
    return this.eventStore.mergeEvents(events);
  }

  /**
   * Reset and replay every persisted event, e.g. after the shape of the
   * derived state changed.
   */
  async rebuild(): Promise<void> {
    await this.onReset();
    await this.eventStore.replayAll();
    this.logger.debug("Projection rebuilt");
  }

  /**
   * Lifecycle hook run before first use.
   */
  async init(): Promise<void> {
    // Subclasses open their own resources here.
  }

  /**
   * Release the projection. The event store is disposed on every path,
   * including when onDispose throws.
   */
  async dispose(): Promise<void> {
    try {
      await this.onDispose();
    } finally {
      await this.eventStore.dispose();
    }
  }

  /**
   * Subclass teardown, run before the event store is released.
   */
  protected async onDispose(): Promise<void> {
    // Nothing to release by default.
  }
}

export interface CatalogProjectionOptions<TState, TBody extends EventBody>
  extends ProjectionOptions<TState> {
  readonly catalog: EventCatalog<TBody>;
}

/**
 * A projection over a closed event union.
 *
 * Every event is decoded through the catalog before `apply` sees it, so
 * `apply` can `switch` exhaustively on `event.type`; types outside the
 * catalog raise UnknownEventTypeError.
 */
export abstract class CatalogProjection<TState, TBody extends EventBody> extends Projection<TState> {
  protected readonly catalog: EventCatalog<TBody>;

  constructor(options: CatalogProjectionOptions<TState, TBody>) {
    super(options);
    this.catalog = options.catalog;
  }

  onEvent(event: Event): void | Promise<void> {
    return this.apply(this.catalog.decode(event));
  }

  protected abstract apply(event: TypedEvent<TBody>): void | Promise<void>;
}

/**
 * Run `fn` against an initialized projection and dispose it afterwards,
 * whether `fn` resolves or throws.
 */
export async function useProjection<P extends Projection<unknown>, R>(
  projection: P,
  fn: (projection: P) => Promise<R>,
): Promise<R> {
  try {
    await projection.init();
    return await fn(projection);
  } finally {
    await projection.dispose();
  }
}
