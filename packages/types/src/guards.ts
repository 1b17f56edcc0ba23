/**
 * Runtime Type Guards
 *
 * Narrowing functions for Coffer domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized snapshots, external integrations).
 */

import type { Identity, VaultId } from "./identity.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Identity guards
// =============================================================================

export function isIdentity(value: unknown): value is Identity {
  return typeof value === "string" && value.length > 0;
}

export function isVaultId(value: unknown): value is VaultId {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["ledger", "node"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    (v.causationId === undefined || typeof v.causationId === "string") &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
