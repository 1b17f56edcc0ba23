/**
 * @coffer/ledger — Multi-owner vault ledger engine.
 *
 * Enforces:
 * - Ownership isolation: only a vault's owner may move its value
 * - Conservation: balance = deposits accepted − withdrawals executed
 * - Safe-transfer ordering: balance is decremented before value leaves
 *
 * Design rules:
 * - All returned values are readonly
 * - Vaults are never deleted; owner and id never change
 * - Fail-closed: invalid operations throw, never silently succeed
 * - All amounts are bigint (no floating point)
 */

// Core engine
export { VaultLedger } from "./vault-ledger.js";
export type { VaultLedgerOptions } from "./vault-ledger.js";

// Storage
export { VaultStore, toVault } from "./vault-store.js";
export type { VaultRecord } from "./vault-store.js";

// Value transfer
export { PayoutBook } from "./transfer.js";
export type { ValueTransfer, TransferResult, ReceiveHook } from "./transfer.js";

// Amount arithmetic
export { parseAmount, formatAmount, assertPositive } from "./amount.js";

// Types
export type {
  Vault,
  VaultView,
  VaultCreated,
  VaultDeposited,
  VaultWithdrawn,
  VaultNotification,
  NotificationHandler,
  Subscription,
  VaultLedgerErrorCode,
  VaultRecordSnapshot,
  VaultLedgerSnapshot,
} from "./types.js";

export { VaultLedgerError } from "./types.js";
