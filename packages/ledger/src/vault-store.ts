/**
 * @coffer/ledger — Vault store.
 *
 * Append-only arena of vault records plus a side index from owner to
 * the ids they own. Both are updated together on every insert.
 *
 * Rules:
 * - vaults[i].id === i (ids are dense and match position)
 * - Every id appears in exactly one owner's list, exactly once
 * - No deletion path: records are never removed
 */

import type { Identity, VaultId } from "@coffer/types";
import type { Vault } from "./types.js";
import { VaultLedgerError } from "./types.js";

/**
 * Internal mutable record. Only `balance` ever changes.
 */
export interface VaultRecord {
  readonly id: VaultId;
  readonly owner: Identity;
  balance: bigint;
}

export class VaultStore {
  private readonly _vaults: VaultRecord[] = [];
  private readonly _byOwner: Map<Identity, VaultId[]> = new Map();

  /**
   * Append a new vault for `owner` with the given starting balance.
   * The id is the current length of the arena.
   */
  insert(owner: Identity, balance: bigint = 0n): VaultRecord {
    const record: VaultRecord = { id: this._vaults.length, owner, balance };
    this._vaults.push(record);

    let owned = this._byOwner.get(owner);
    if (owned === undefined) {
      owned = [];
      this._byOwner.set(owner, owned);
    }
    owned.push(record.id);

    return record;
  }

  /**
   * Get a record by id. Returns undefined for anything outside [0, count).
   */
  get(id: VaultId): VaultRecord | undefined {
    if (!Number.isInteger(id) || id < 0) {
      return undefined;
    }
    return this._vaults[id];
  }

  /**
   * Get a record by id. Throws NOT_FOUND if absent.
   */
  assertExists(id: VaultId): VaultRecord {
    const record = this.get(id);
    if (record === undefined) {
      throw new VaultLedgerError("NOT_FOUND", `Unknown vault: ${String(id)}`, {
        vaultId: id,
      });
    }
    return record;
  }

  /**
   * Ids owned by `owner`, in creation order. Empty if none.
   */
  idsOwnedBy(owner: Identity): readonly VaultId[] {
    const owned = this._byOwner.get(owner);
    return owned === undefined ? [] : [...owned];
  }

  /**
   * Frozen copies of every vault, in id order.
   */
  getAll(): readonly Vault[] {
    return this._vaults.map(toVault);
  }

  get count(): number {
    return this._vaults.length;
  }

  /**
   * Sum of all vault balances.
   */
  get totalBalance(): bigint {
    let total = 0n;
    for (const record of this._vaults) {
      total += record.balance;
    }
    return total;
  }
}

export function toVault(record: VaultRecord): Vault {
  return Object.freeze({ id: record.id, owner: record.owner, balance: record.balance });
}
