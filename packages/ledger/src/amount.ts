/**
 * @coffer/ledger — Amount parsing.
 *
 * Vault balances are whole numbers of the smallest indivisible unit,
 * held as bigint. Text crosses the boundary (JSON, snapshots) as a
 * base-10 integer string.
 *
 * Rules:
 * - No floating-point operations
 * - No fractional or signed input
 */

import { VaultLedgerError } from "./types.js";

const AMOUNT_PATTERN = /^\d+$/;

/**
 * Parse a base-10 integer string into a bigint amount.
 *
 * "1500" → 1500n
 * "0"    → 0n
 * "-5", "1.5", "", "0x10" → throws INVALID_AMOUNT
 */
export function parseAmount(text: string): bigint {
  const trimmed = text.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    throw new VaultLedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }
  return BigInt(trimmed);
}

/**
 * Format a bigint amount as a base-10 string.
 */
export function formatAmount(amount: bigint): string {
  return amount.toString();
}

/**
 * Assert an amount is strictly positive.
 */
export function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new VaultLedgerError(
      "INVALID_AMOUNT",
      `Amount must be positive, got ${amount.toString()}`,
    );
  }
}
