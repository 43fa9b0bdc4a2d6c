/**
 * @termvault/event-store — Core types.
 *
 * Interfaces for the append-only multivault event log.
 *
 * - Events are immutable once stored
 * - Streams only grow; there is no update or delete
 * - Versions within a stream are contiguous, starting at 1
 * - Appends may carry an expected version (optimistic locking)
 */

import type { DomainEvent, EventMetadata } from "@termvault/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store: the domain event plus its
 * position in its stream and in the global log.
 */
export interface StoredEvent<TPayload = Readonly<Record<string, unknown>>> {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<TPayload>;
  }>;

  readonly streamId: string;

  /** Position within the stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** ISO 8601 time the store accepted the event */
  readonly appendedAt: string;
}

/**
 * A stored event linked into the tamper-evident hash chain.
 */
export interface HashedStoredEvent<TPayload = Readonly<Record<string, unknown>>>
  extends StoredEvent<TPayload> {
  /** SHA-256 of this event's canonical content and `previousHash` */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH */
  readonly previousHash: string;
}

export function isHashedEvent(event: StoredEvent): event is HashedStoredEvent {
  return (
    "hash" in event &&
    typeof event.hash === "string" &&
    "previousHash" in event &&
    typeof event.previousHash === "string"
  );
}

// =============================================================================
// Append Options
// =============================================================================

/**
 * Expected version for optimistic concurrency control.
 *
 * - A number: the stream must be at exactly this version
 * - "no_stream": the stream must not exist yet
 * - "any": no check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;

  /** Version of the first appended event */
  readonly fromVersion: number;

  /** Version of the last appended event (the new stream head) */
  readonly toVersion: number;

  readonly count: number;
}

// =============================================================================
// Read Options
// =============================================================================

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** First version to read (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;

  /** Maximum number of events. Default: unlimited */
  readonly maxCount?: number;

  /** Default: "forward" */
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** First global position to read (inclusive). Default: 1 */
  readonly fromPosition?: number;

  /** Maximum number of events. Default: unlimited */
  readonly maxCount?: number;

  /** Default: "forward" */
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: HashedStoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  /** Global position of the offending event */
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Last global position whose hash checked out, 0 if none */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Stream versions are contiguous (1, 2, 3, ...)
 * - Global positions are contiguous across all streams
 * - Subscribers see events in append order
 */
export interface EventStore {
  /**
   * Append events to a stream, all or nothing.
   *
   * @throws EventStoreError on an empty batch or a version conflict
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events of one stream; empty if the stream does not exist. */
  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[];

  /** Events of all streams in global order. */
  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the stream head, 0 if the stream does not exist. */
  streamVersion(streamId: string): number;

  /** Position of the last stored event, 0 if the store is empty. */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
