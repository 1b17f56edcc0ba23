/**
 * Property-Based Tests for @coffer/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence
 * of operations:
 *
 * 1. Ids are 0, 1, 2, … in call order and count matches
 * 2. Owner lists partition the id range (ownership isolation)
 * 3. Balance = Σ accepted deposits − Σ executed withdrawals
 * 4. Value in custody + value paid out = value deposited
 * 5. Nested withdrawals never exceed the balance at entry
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { VaultLedger } from "../src/vault-ledger.js";
import { PayoutBook } from "../src/transfer.js";
import { VaultLedgerError } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const OWNERS = ["alice", "bob", "carol", "dave"] as const;

const arbOwner = fc.constantFrom(...OWNERS);

/** Amounts include zero so rejected operations are exercised too. */
const arbAmount = fc.bigInt({ min: 0n, max: 1_000n });

type Op =
  | { readonly kind: "create"; readonly caller: string }
  | { readonly kind: "deposit"; readonly caller: string; readonly vault: number; readonly amount: bigint }
  | { readonly kind: "withdraw"; readonly caller: string; readonly vault: number; readonly amount: bigint };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  arbOwner.map((caller): Op => ({ kind: "create", caller })),
  fc
    .tuple(arbOwner, fc.nat({ max: 12 }), arbAmount)
    .map(([caller, vault, amount]): Op => ({ kind: "deposit", caller, vault, amount })),
  fc
    .tuple(arbOwner, fc.nat({ max: 12 }), arbAmount)
    .map(([caller, vault, amount]): Op => ({ kind: "withdraw", caller, vault, amount })),
);

// =============================================================================
// Model
// =============================================================================

interface ModelVault {
  owner: string;
  deposited: bigint;
  withdrawn: bigint;
}

/**
 * Apply an op to both the ledger and a plain model. The model only
 * records an op when the ledger accepted it.
 */
function apply(ledger: VaultLedger, model: ModelVault[], op: Op): void {
  try {
    switch (op.kind) {
      case "create": {
        const id = ledger.createVault(op.caller);
        expect(id).toBe(model.length);
        model.push({ owner: op.caller, deposited: 0n, withdrawn: 0n });
        return;
      }
      case "deposit": {
        ledger.depositInto(op.caller, op.vault, op.amount);
        const vault = model[op.vault];
        if (vault === undefined) throw new Error("ledger accepted a deposit into an unknown vault");
        vault.deposited += op.amount;
        return;
      }
      case "withdraw": {
        ledger.withdrawFrom(op.caller, op.vault, op.amount);
        const vault = model[op.vault];
        if (vault === undefined) throw new Error("ledger accepted a withdrawal from an unknown vault");
        vault.withdrawn += op.amount;
        return;
      }
    }
  } catch (err: unknown) {
    if (!(err instanceof VaultLedgerError)) throw err;
  }
}

// =============================================================================
// Properties
// =============================================================================

describe("ledger properties", () => {
  it("ids are dense and count equals number of creates", () => {
    fc.assert(
      fc.property(fc.array(arbOwner, { maxLength: 40 }), (callers) => {
        const ledger = new VaultLedger({ transfer: new PayoutBook() });
        const ids = callers.map((caller) => ledger.createVault(caller));
        expect(ids).toEqual(callers.map((_, i) => i));
        expect(ledger.getVaultCount()).toBe(callers.length);
      }),
    );
  });

  it("owner lists partition the id range", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 60 }), (ops) => {
        const ledger = new VaultLedger({ transfer: new PayoutBook() });
        const model: ModelVault[] = [];
        for (const op of ops) apply(ledger, model, op);

        const seen: number[] = [];
        for (const owner of OWNERS) {
          for (const id of ledger.getVaultsOwnedBy(owner)) {
            expect(ledger.getVault(id).owner).toBe(owner);
            seen.push(id);
          }
        }
        seen.sort((a, b) => a - b);
        expect(seen).toEqual(model.map((_, i) => i));
      }),
    );
  });

  it("balance equals accepted deposits minus executed withdrawals", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 80 }), (ops) => {
        const ledger = new VaultLedger({ transfer: new PayoutBook() });
        const model: ModelVault[] = [];
        for (const op of ops) {
          apply(ledger, model, op);
        }

        model.forEach((vault, id) => {
          const view = ledger.getVault(id);
          expect(view.owner).toBe(vault.owner);
          expect(view.balance).toBe(vault.deposited - vault.withdrawn);
          expect(view.balance >= 0n).toBe(true);
        });
      }),
    );
  });

  it("custody plus payouts equals deposits, even with refused payouts", () => {
    fc.assert(
      fc.property(
        fc.array(arbOp, { maxLength: 80 }),
        fc.subarray([...OWNERS]),
        (ops, refusing) => {
          const payouts = new PayoutBook(refusing);
          const ledger = new VaultLedger({ transfer: payouts });
          const model: ModelVault[] = [];
          for (const op of ops) apply(ledger, model, op);

          const deposited = model.reduce((sum, v) => sum + v.deposited, 0n);
          expect(ledger.totalHeld + payouts.totalPaid).toBe(deposited);
          for (const owner of refusing) {
            expect(payouts.paidTo(owner)).toBe(0n);
          }
        },
      ),
    );
  });

  it("nested withdrawals never exceed the balance at entry", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 1n, max: 1_000n }),
        fc.array(fc.bigInt({ min: 1n, max: 500n }), { minLength: 1, maxLength: 8 }),
        (balance, attempts) => {
          const payouts = new PayoutBook();
          const ledger = new VaultLedger({ transfer: payouts });
          const id = ledger.createVault("mallory");
          ledger.depositInto("mallory", id, balance);

          const queue = [...attempts];
          payouts.setReceiveHook("mallory", () => {
            const next = queue.shift();
            if (next === undefined) return;
            try {
              ledger.withdrawFrom("mallory", id, next);
            } catch (err: unknown) {
              if (!(err instanceof VaultLedgerError)) throw err;
            }
          });

          const first = queue.shift();
          if (first === undefined) return;
          try {
            ledger.withdrawFrom("mallory", id, first);
          } catch (err: unknown) {
            if (!(err instanceof VaultLedgerError)) throw err;
          }

          expect(payouts.paidTo("mallory") <= balance).toBe(true);
          expect(ledger.getVault(id).balance).toBe(balance - payouts.paidTo("mallory"));
        },
      ),
    );
  });
});
