/**
 * @coffer/ledger — Core VaultLedger class.
 *
 * Multi-owner balance ledger. Any caller may open vaults; only a vault's
 * owner may deposit into or withdraw from it.
 *
 * API surface:
 * - createVault() — Open a new vault owned by the caller
 * - depositInto() — Credit a vault the caller owns
 * - withdrawFrom() — Debit a vault the caller owns and pay the caller
 * - getVault() — Owner and balance of a vault
 * - getVaultCount() — Number of vaults ever created
 * - getVaultsOwnedBy() — Ids a caller owns, in creation order
 * - subscribe() — Receive notifications of committed changes
 * - snapshot() / fromSnapshot() — Serialize and restore state
 *
 * Every precondition is checked before any state is touched. A vault is
 * never deleted and its owner and id never change.
 */

import type { Identity, VaultId } from "@coffer/types";
import { isIdentity } from "@coffer/types";
import { assertPositive, formatAmount, parseAmount } from "./amount.js";
import type { TransferResult, ValueTransfer } from "./transfer.js";
import type {
  NotificationHandler,
  Subscription,
  Vault,
  VaultLedgerSnapshot,
  VaultNotification,
  VaultView,
} from "./types.js";
import { VaultLedgerError } from "./types.js";
import { VaultStore } from "./vault-store.js";
import type { VaultRecord } from "./vault-store.js";

export interface VaultLedgerOptions {
  /** Sends withdrawn value to the caller. */
  readonly transfer: ValueTransfer;
  /** ISO timestamp source for snapshots. Default: wall clock. */
  readonly clock?: (() => string) | undefined;
}

export class VaultLedger {
  private readonly _store: VaultStore = new VaultStore();
  private readonly _handlers: Set<NotificationHandler> = new Set();
  private readonly _transfer: ValueTransfer;
  private readonly _clock: () => string;

  constructor(options: VaultLedgerOptions) {
    this._transfer = options.transfer;
    this._clock = options.clock ?? (() => new Date().toISOString());
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Open a new vault owned by `caller`.
   * Returns its id, which equals the number of vaults created before.
   */
  createVault(caller: Identity): VaultId {
    if (!isIdentity(caller)) {
      throw new VaultLedgerError("INVALID_IDENTITY", "Caller identity must be a non-empty string");
    }

    const record = this._store.insert(caller);
    this._notify({ type: "VaultCreated", vaultId: record.id, owner: record.owner });
    return record.id;
  }

  /**
   * Credit `amount` to a vault the caller owns.
   *
   * Checks, in order: NOT_FOUND, UNAUTHORIZED, INVALID_AMOUNT.
   */
  depositInto(caller: Identity, vaultId: VaultId, amount: bigint): void {
    const record = this._assertOwned(caller, vaultId);
    assertPositive(amount);

    record.balance += amount;
    this._notify({ type: "VaultDeposited", vaultId, owner: record.owner, amount });
  }

  /**
   * Debit `amount` from a vault the caller owns and send it to the caller.
   *
   * Checks, in order: NOT_FOUND, UNAUTHORIZED, INVALID_AMOUNT,
   * INSUFFICIENT_BALANCE. The balance is decremented before the transfer
   * is attempted, so a re-entrant call made during the transfer sees the
   * reduced balance. If the transfer fails the decrement is re-applied
   * and TRANSFER_FAILED is thrown.
   */
  withdrawFrom(caller: Identity, vaultId: VaultId, amount: bigint): void {
    const record = this._assertOwned(caller, vaultId);
    assertPositive(amount);

    if (amount > record.balance) {
      throw new VaultLedgerError(
        "INSUFFICIENT_BALANCE",
        `Vault ${String(vaultId)} holds ${formatAmount(record.balance)}, cannot withdraw ${formatAmount(amount)}`,
        { vaultId },
      );
    }

    // Effects before interaction.
    record.balance -= amount;

    let result: TransferResult;
    try {
      result = this._transfer.send(caller, amount);
    } catch (err: unknown) {
      record.balance += amount;
      throw new VaultLedgerError(
        "TRANSFER_FAILED",
        `Transfer of ${formatAmount(amount)} to "${caller}" threw: ${err instanceof Error ? err.message : String(err)}`,
        { vaultId, cause: err },
      );
    }

    if (!result.ok) {
      record.balance += amount;
      throw new VaultLedgerError(
        "TRANSFER_FAILED",
        `Transfer of ${formatAmount(amount)} to "${caller}" failed: ${result.reason}`,
        { vaultId },
      );
    }

    this._notify({ type: "VaultWithdrawn", vaultId, owner: record.owner, amount });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Owner and current balance of a vault. Throws NOT_FOUND if absent.
   */
  getVault(vaultId: VaultId): VaultView {
    const record = this._store.assertExists(vaultId);
    return Object.freeze({ owner: record.owner, balance: record.balance });
  }

  getVaultCount(): number {
    return this._store.count;
  }

  /**
   * Ids owned by `caller`, in creation order. Empty if none.
   */
  getVaultsOwnedBy(caller: Identity): readonly VaultId[] {
    return this._store.idsOwnedBy(caller);
  }

  /**
   * All vaults, in id order.
   */
  getVaults(): readonly Vault[] {
    return this._store.getAll();
  }

  /**
   * Sum of every vault's balance: the value currently in custody.
   */
  get totalHeld(): bigint {
    return this._store.totalBalance;
  }

  // ─── Notifications ───────────────────────────────────────────────────

  /**
   * Receive a notification for every committed change.
   * Handlers run synchronously, in subscription order.
   */
  subscribe(handler: NotificationHandler): Subscription {
    this._handlers.add(handler);
    return {
      unsubscribe: () => {
        this._handlers.delete(handler);
      },
    };
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): VaultLedgerSnapshot {
    return {
      version: 1,
      vaults: this._store.getAll().map((vault) => ({
        id: vault.id,
        owner: vault.owner,
        balance: formatAmount(vault.balance),
      })),
      createdAt: this._clock(),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * Rebuilds the arena and owner index without emitting notifications.
   */
  static fromSnapshot(snapshot: VaultLedgerSnapshot, options: VaultLedgerOptions): VaultLedger {
    if (snapshot.version !== 1) {
      throw new VaultLedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }

    const ledger = new VaultLedger(options);

    snapshot.vaults.forEach((vault, index) => {
      if (vault.id !== index) {
        throw new VaultLedgerError(
          "INVALID_SNAPSHOT",
          `Vault at position ${String(index)} has id ${String(vault.id)}`,
        );
      }
      if (!isIdentity(vault.owner)) {
        throw new VaultLedgerError(
          "INVALID_SNAPSHOT",
          `Vault ${String(index)} has an empty owner`,
        );
      }

      let balance: bigint;
      try {
        balance = parseAmount(vault.balance);
      } catch (err: unknown) {
        throw new VaultLedgerError(
          "INVALID_SNAPSHOT",
          `Vault ${String(index)} has an invalid balance: "${vault.balance}"`,
          { vaultId: index, cause: err },
        );
      }

      ledger._store.insert(vault.owner, balance);
    });

    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _assertOwned(caller: Identity, vaultId: VaultId): VaultRecord {
    const record = this._store.assertExists(vaultId);
    if (record.owner !== caller) {
      throw new VaultLedgerError(
        "UNAUTHORIZED",
        `Vault ${String(vaultId)} is not owned by "${caller}"`,
        { vaultId },
      );
    }
    return record;
  }

  private _notify(notification: VaultNotification): void {
    for (const handler of this._handlers) {
      handler(notification);
    }
  }
}
