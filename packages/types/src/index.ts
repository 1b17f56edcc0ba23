/**
 * @coffer/types — Shared domain types for the Coffer stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Meaning lives in consuming code, not in these types
 */

// Identity types
export type { Identity, VaultId } from "./identity.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isIdentity,
  isVaultId,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
