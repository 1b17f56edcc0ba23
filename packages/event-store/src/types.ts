/**
 * @coffer/event-store — Core types.
 *
 * Defines the interfaces and types for append-only event persistence.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every stored event is linked to its predecessor by hash
 */

import type { DomainEvent, EventMetadata } from "@coffer/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 *
 * Wraps a DomainEvent with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: monotonically increasing position within the stream
 * - globalPosition: monotonically increasing position across all streams
 */
export interface StoredEvent<TPayload = Record<string, unknown>> {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<TPayload>;
  }>;

  readonly streamId: string;

  /** Position within this stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;
}

/**
 * A stored event carrying its hash-chain link.
 */
export interface HashedStoredEvent<TPayload = Record<string, unknown>>
  extends StoredEvent<TPayload> {
  /** SHA-256 of this event's canonical content + previousHash */
  readonly hash: string;

  /** Hash of the event at globalPosition - 1, or GENESIS_HASH */
  readonly previousHash: string;
}

// =============================================================================
// Read Options
// =============================================================================

export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number | undefined;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number | undefined;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number | undefined;

  /** Only return events of this type */
  readonly eventType?: string | undefined;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number | undefined;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event whose link was checked */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only audit trail, one stream per vault.
 *
 * Invariants:
 * - Records are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are contiguous across streams
 * - Each record's previousHash is the hash of the record before it
 */
export interface EventStore {
  /** Append one event to a stream and return the stored record. */
  append(streamId: string, event: DomainEvent): HashedStoredEvent;

  /** Events of a single stream in version order. Empty if the stream doesn't exist. */
  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[];

  /** Events across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[];

  /** Position of the last event, or 0 if the store is empty */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode = "INVALID_STREAM_ID" | "INVALID_VERSION";

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
