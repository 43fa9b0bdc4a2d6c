/**
 * @termvault/event-store — In-memory EventStore.
 *
 * Keeps the log in plain arrays for the lifetime of the process. The
 * multivault commits each call's events here in one append, so the
 * log only ever holds the effects of calls that completed.
 *
 * - Amortized O(1) append
 * - Synchronous subscription dispatch, after the append is stored
 * - No durability
 */

import type { DomainEvent } from "@termvault/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** ISO timestamp source for `appendedAt`. Default: wall clock */
  readonly now?: () => string;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, HashedStoredEvent[]>();
  private readonly _globalLog: HashedStoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _now: () => string;
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._now = options?.now ?? (() => new Date().toISOString());
  }

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

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options);

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = currentVersion + 1;
    const appendedAt = this._now();
    const stored: HashedStoredEvent[] = [];

    events.forEach((event, i) => {
      const base: StoredEvent = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const hashed: HashedStoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      this._lastHash = hashed.hash;

      stream.push(hashed);
      this._globalLog.push(hashed);
      stored.push(hashed);
    });

    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result =
      (options?.direction ?? "forward") === "forward"
        ? stream.filter((e) => e.version >= fromVersion)
        : stream.filter((e) => e.version <= fromVersion).reverse();

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;

    const result =
      (options?.direction ?? "forward") === "forward"
        ? this._globalLog.filter((e) => e.globalPosition >= fromPosition)
        : this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse();

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    const set = subscribers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
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

  // ─── Integrity ──────────────────────────────────────────────────────

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
    options: AppendOptions | undefined,
  ): void {
    const expected = options?.expectedVersion;
    if (expected === undefined || expected === "any") {
      return;
    }
    if (expected === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
          streamId,
        );
      }
      return;
    }
    if (currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, events: readonly HashedStoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    for (const event of events) {
      if (streamSubs !== undefined) {
        for (const handler of streamSubs) {
          handler(event);
        }
      }
      for (const handler of this._globalSubscribers) {
        handler(event);
      }
    }
  }
}

function limit<T>(items: T[], maxCount: number | undefined): T[] {
  return maxCount !== undefined && maxCount >= 0 ? items.slice(0, maxCount) : items;
}
