/**
 * @coffer/event-store — In-memory audit trail.
 *
 * One global log in append order, with a per-vault index of log slots.
 * Every record is chained to the one before it, across all vaults.
 * State lives for the lifetime of the node process.
 */

import type { DomainEvent } from "@coffer/types";
import type {
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** ISO timestamp source for `appendedAt`. Default: wall clock. */
  readonly clock?: (() => string) | undefined;
}

export class InMemoryEventStore implements EventStore {
  private readonly _log: HashedStoredEvent[] = [];

  /** streamId → indexes into `_log`, in version order */
  private readonly _slots = new Map<string, number[]>();

  private readonly _clock: () => string;

  constructor(options?: InMemoryEventStoreOptions) {
    this._clock = options?.clock ?? (() => new Date().toISOString());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, event: DomainEvent): HashedStoredEvent {
    assertStreamId(streamId);

    const slots = this._slots.get(streamId) ?? [];
    const head = this._log.at(-1);

    const base: StoredEvent = {
      event: { type: event.type, metadata: event.metadata, payload: event.payload },
      streamId,
      version: slots.length + 1,
      globalPosition: this._log.length + 1,
      appendedAt: this._clock(),
    };
    const previousHash = head?.hash ?? GENESIS_HASH;
    const stored: HashedStoredEvent = {
      ...base,
      hash: computeEventHash(base, previousHash),
      previousHash,
    };

    slots.push(this._log.length);
    this._slots.set(streamId, slots);
    this._log.push(stored);
    return stored;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
    assertStreamId(streamId);
    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const slots = this._slots.get(streamId) ?? [];
    const events: HashedStoredEvent[] = [];
    // Versions are contiguous from 1, so version v sits at slot v - 1.
    for (const slot of slots.slice(fromVersion - 1)) {
      const stored = this._log[slot];
      if (stored !== undefined) events.push(stored);
    }
    return limit(events, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    if (fromPosition < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromPosition must be >= 1, got ${fromPosition}`,
      );
    }

    const eventType = options?.eventType;
    const events = this._log
      .slice(fromPosition - 1)
      .filter((e) => eventType === undefined || e.event.type === eventType);
    return limit(events, options?.maxCount);
  }

  // ─── Query ──────────────────────────────────────────────────────────

  globalPosition(): number {
    return this._log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function assertStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

function limit(
  events: HashedStoredEvent[],
  maxCount: number | undefined,
): readonly HashedStoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
