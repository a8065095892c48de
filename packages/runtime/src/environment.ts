/**
 * Environment — the execution context every Shareport component runs in.
 *
 * Provides what a ledger on a chain takes for granted:
 * - A clock (unix seconds) and a block height
 * - A chain id (bound into signed payloads)
 * - A global, strictly increasing sequence for ordering operations
 * - Whole-operation atomicity: either every step of an operation is
 *   recorded or none is
 * - Event emission that only publishes events of committed operations,
 *   each checked against the event catalog
 *
 * Atomic scopes checkpoint every registered participant before running an
 * operation and restore them all if it throws. Nested scopes join the
 * outermost one.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSource, JsonValue } from "@shareport/types";
import type { EventCatalog, EventStore } from "@shareport/event-store";
import { InMemoryEventStore, createShareportCatalog } from "@shareport/event-store";
import { RuntimeError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A stateful component whose state can be captured and put back.
 */
export interface Checkpointable<S> {
  checkpoint(): S;
  restore(state: S): void;
}

export interface EnvironmentOptions {
  readonly chainId: number;
  /** Initial unix time in seconds. Default: 1_700_000_000 */
  readonly timestamp?: bigint;
  /** Initial block height. Default: 1 */
  readonly height?: bigint;
  /** Where committed events go. Default: a fresh InMemoryEventStore */
  readonly eventStore?: EventStore;
  /** Schemas emitted events must satisfy. Default: the Shareport catalog */
  readonly catalog?: EventCatalog;
}

/**
 * An event waiting for its operation to commit.
 */
interface PendingEvent {
  readonly streamId: string;
  readonly event: DomainEvent;
}

interface AtomicScope {
  readonly correlationId: string;
  readonly pending: PendingEvent[];
}

type Restorer = () => void;

// =============================================================================
// Environment
// =============================================================================

export class Environment {
  readonly chainId: number;
  readonly events: EventStore;
  readonly catalog: EventCatalog;

  private _timestamp: bigint;
  private _height: bigint;
  private _sequence = 0;
  private _scope: AtomicScope | null = null;
  private readonly _participants: Array<() => Restorer> = [];

  constructor(options: EnvironmentOptions) {
    if (!Number.isInteger(options.chainId) || options.chainId <= 0) {
      throw new RuntimeError("INVALID_AMOUNT", `Chain id must be a positive integer, got ${options.chainId}`);
    }
    this.chainId = options.chainId;
    this._timestamp = options.timestamp ?? 1_700_000_000n;
    this._height = options.height ?? 1n;
    this.events = options.eventStore ?? new InMemoryEventStore();
    this.catalog = options.catalog ?? createShareportCatalog();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Clock
  // ───────────────────────────────────────────────────────────────────────

  /** Current unix time in seconds. */
  get timestamp(): bigint {
    return this._timestamp;
  }

  get height(): bigint {
    return this._height;
  }

  /**
   * Advance the clock and produce a new block.
   */
  advanceTime(seconds: bigint): void {
    if (seconds < 0n) {
      throw new RuntimeError("INVALID_TIME", `Cannot move the clock backwards by ${seconds}s`);
    }
    this._timestamp += seconds;
    this._height += 1n;
  }

  /** Produce a new block without moving the clock. */
  mine(): void {
    this._height += 1n;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Sequence
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Next value of the global operation sequence.
   *
   * Never rolled back: a failed operation may leave a gap, but no value is
   * ever handed out twice.
   */
  nextSequence(): number {
    this._sequence += 1;
    return this._sequence;
  }

  get sequence(): number {
    return this._sequence;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Atomicity
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Register a component whose state takes part in atomic scopes.
   */
  register<S>(participant: Checkpointable<S>): void {
    this._participants.push(() => {
      const state = participant.checkpoint();
      return () => participant.restore(state);
    });
  }

  /** True while an atomic operation is running. */
  get inAtomicScope(): boolean {
    return this._scope !== null;
  }

  /**
   * Run `operation` with all-or-nothing semantics.
   *
   * On success, events emitted during the operation are appended to the
   * event store. On failure, every participant is restored, the events are
   * discarded and the error is rethrown unchanged.
   */
  atomic<T>(operation: () => T): T {
    if (this._scope !== null) {
      return operation();
    }

    const restorers = this._participants.map((capture) => capture());
    const scope: AtomicScope = { correlationId: randomUUID(), pending: [] };
    this._scope = scope;

    let result: T;
    try {
      result = operation();
    } catch (error) {
      for (let i = restorers.length - 1; i >= 0; i--) {
        restorers[i]?.();
      }
      throw error;
    } finally {
      this._scope = null;
    }

    for (const { streamId, event } of scope.pending) {
      this.events.append(streamId, [event]);
    }
    return result;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Events
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Emit a domain event.
   *
   * Inside an atomic scope the event is held until the scope commits;
   * outside one it is appended immediately. An event its catalog schema
   * refuses throws, which fails the surrounding operation.
   */
  emit(
    streamId: string,
    type: string,
    source: EventSource,
    actor: string,
    payload: Readonly<Record<string, JsonValue>>,
  ): void {
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date(Number(this._timestamp) * 1000).toISOString(),
        height: this._height.toString(),
        actor,
        correlationId: this._scope?.correlationId ?? randomUUID(),
        source,
      },
      payload,
    };

    const validation = this.catalog.validate(event);
    if (!validation.valid) {
      throw new RuntimeError(
        "INVALID_EVENT",
        `Event "${type}" on ${streamId} is invalid: ${validation.issues.join("; ")}`,
      );
    }

    if (this._scope !== null) {
      this._scope.pending.push({ streamId, event });
      return;
    }
    this.events.append(streamId, [event]);
  }
}
