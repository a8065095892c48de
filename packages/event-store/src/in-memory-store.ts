/**
 * @shareport/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. All state is lost on process exit.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch, after the append has completed
 */

import type { DomainEvent } from "@shareport/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const stream = this._streams.get(streamId) ?? [];
    const currentVersion = stream.length;
    this._checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    const appendedAt = new Date().toISOString();
    const stored: StoredEvent[] = [];

    events.forEach((event, i) => {
      const base = {
        event,
        streamId,
        version: currentVersion + i + 1,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const record: StoredEvent = {
        ...base,
        previousHash,
        hash: computeEventHash(base, previousHash),
      };
      this._lastHash = record.hash;
      stream.push(record);
      this._globalLog.push(record);
      stored.push(record);
    });

    this._streams.set(streamId, stream);
    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion: currentVersion + 1,
      toVersion: currentVersion + events.length,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    const selected = options?.direction === "backward"
      ? stream.filter((e) => e.version <= fromVersion).reverse()
      : stream.filter((e) => e.version >= fromVersion);

    return limit(selected, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const inRange = options?.direction === "backward"
      ? this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse()
      : this._globalLog.filter((e) => e.globalPosition >= fromPosition);

    return limit(inRange.filter((e) => matches(e.event, options)), options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    const subscribers = this._streamSubscribers.get(streamId) ?? new Set<EventHandler>();
    subscribers.add(handler);
    this._streamSubscribers.set(streamId, subscribers);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    expected: AppendOptions["expectedVersion"],
  ): void {
    if (expected === undefined || expected === "any") {
      return;
    }
    if (expected === "no_stream" && currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expected === "number" && currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    for (const event of events) {
      if (streamSubs !== undefined) {
        for (const handler of streamSubs) handler(event);
      }
      for (const handler of this._globalSubscribers) handler(event);
    }
  }
}

function matches(event: DomainEvent, options: ReadAllOptions | undefined): boolean {
  if (options?.correlationId !== undefined && event.metadata.correlationId !== options.correlationId) {
    return false;
  }
  if (options?.source !== undefined && event.metadata.source !== options.source) {
    return false;
  }
  return options?.types === undefined || options.types.includes(event.type);
}

function limit(events: StoredEvent[], maxCount: number | undefined): readonly StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
