/**
 * @coffer/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for the per-vault audit trail
 * - InMemoryEventStore with a SHA-256 hash chain over every event
 * - Vault ledger event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Vault events
export { VAULT_EVENTS, isVaultEventType, vaultStreamId } from "./vault-events.js";
export type {
  VaultEventType,
  VaultCreatedPayload,
  VaultDepositedPayload,
  VaultWithdrawnPayload,
} from "./vault-events.js";
