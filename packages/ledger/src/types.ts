/**
 * @coffer/ledger — Types for the vault ledger engine.
 *
 * Rules:
 * - Everything handed to callers is readonly
 * - Vault owner and id never change once assigned
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Identity, VaultId } from "@coffer/types";

// ─── Vault Types ─────────────────────────────────────────────────────────

/**
 * One isolated balance account.
 * Balance is in the smallest indivisible unit of the tracked value.
 */
export interface Vault {
  readonly id: VaultId;
  readonly owner: Identity;
  readonly balance: bigint;
}

/**
 * Read model returned by getVault().
 */
export interface VaultView {
  readonly owner: Identity;
  readonly balance: bigint;
}

// ─── Notification Types ──────────────────────────────────────────────────

export interface VaultCreated {
  readonly type: "VaultCreated";
  readonly vaultId: VaultId;
  readonly owner: Identity;
}

export interface VaultDeposited {
  readonly type: "VaultDeposited";
  readonly vaultId: VaultId;
  readonly owner: Identity;
  readonly amount: bigint;
}

export interface VaultWithdrawn {
  readonly type: "VaultWithdrawn";
  readonly vaultId: VaultId;
  readonly owner: Identity;
  readonly amount: bigint;
}

/**
 * Emitted after a ledger operation commits. Never emitted for a
 * failed operation.
 */
export type VaultNotification = VaultCreated | VaultDeposited | VaultWithdrawn;

/**
 * Synchronous receiver of ledger notifications.
 */
export type NotificationHandler = (notification: VaultNotification) => void;

/**
 * A subscription that can be detached.
 */
export interface Subscription {
  unsubscribe(): void;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type VaultLedgerErrorCode =
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "TRANSFER_FAILED"
  | "INVALID_IDENTITY"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returned as a code.
 */
export class VaultLedgerError extends Error {
  public readonly code: VaultLedgerErrorCode;
  public readonly vaultId?: VaultId | undefined;

  constructor(
    code: VaultLedgerErrorCode,
    message: string,
    options?: { vaultId?: VaultId | undefined; cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "VaultLedgerError";
    this.code = code;
    this.vaultId = options?.vaultId;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * A vault as serialized in a snapshot. Balance is a base-10 string
 * so the snapshot survives JSON.
 */
export interface VaultRecordSnapshot {
  readonly id: VaultId;
  readonly owner: Identity;
  readonly balance: string;
}

/**
 * Serializable snapshot of the entire ledger state.
 */
export interface VaultLedgerSnapshot {
  readonly version: 1;
  readonly vaults: readonly VaultRecordSnapshot[];
  readonly createdAt: string;
}
