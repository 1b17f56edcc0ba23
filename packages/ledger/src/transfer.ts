/**
 * @coffer/ledger — Outbound value transfer.
 *
 * The ledger does not move value itself. On withdrawal it asks a
 * ValueTransfer to send the amount to the caller and observes the
 * outcome. A transfer may run recipient-side logic that calls back
 * into the ledger before it returns.
 */

import type { Identity } from "@coffer/types";

export type TransferResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

/**
 * Moves value out of the ledger's custody to a recipient.
 */
export interface ValueTransfer {
  send(recipient: Identity, amount: bigint): TransferResult;
}

/**
 * Recipient-side logic run while a payout is being delivered.
 * Throwing rejects the payout.
 */
export type ReceiveHook = (amount: bigint) => void;

/**
 * In-process record of value paid out of the ledger.
 *
 * Recipients can refuse payouts or attach a receive hook, which runs
 * before the payout is credited. A hook that throws leaves the
 * recipient's total unchanged.
 */
export class PayoutBook implements ValueTransfer {
  private readonly _paid: Map<Identity, bigint> = new Map();
  private readonly _refusing: Set<Identity> = new Set();
  private readonly _hooks: Map<Identity, ReceiveHook> = new Map();

  constructor(refusing: Iterable<Identity> = []) {
    for (const recipient of refusing) {
      this.refuse(recipient);
    }
  }

  send(recipient: Identity, amount: bigint): TransferResult {
    if (this._refusing.has(recipient)) {
      return { ok: false, reason: `Recipient "${recipient}" refuses payouts` };
    }

    const hook = this._hooks.get(recipient);
    if (hook !== undefined) {
      hook(amount);
    }

    this._paid.set(recipient, this.paidTo(recipient) + amount);
    return { ok: true };
  }

  /** Make every future payout to `recipient` fail. */
  refuse(recipient: Identity): void {
    this._refusing.add(recipient);
  }

  /**
   * Attach (or with `undefined`, detach) the receive hook for a recipient.
   */
  setReceiveHook(recipient: Identity, hook: ReceiveHook | undefined): void {
    if (hook === undefined) {
      this._hooks.delete(recipient);
    } else {
      this._hooks.set(recipient, hook);
    }
  }

  /** Total paid out to a recipient so far. */
  paidTo(recipient: Identity): bigint {
    return this._paid.get(recipient) ?? 0n;
  }

  /** Total paid out to everyone. */
  get totalPaid(): bigint {
    let total = 0n;
    for (const amount of this._paid.values()) {
      total += amount;
    }
    return total;
  }
}
