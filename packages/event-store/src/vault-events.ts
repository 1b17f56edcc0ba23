/**
 * @coffer/event-store — Vault ledger event definitions.
 *
 * Naming convention: `vault.<action>`. Amounts are base-10 strings so
 * payloads stay JSON-safe and canonicalize deterministically.
 */

export const VAULT_EVENTS = {
  created: "vault.created",
  deposited: "vault.deposited",
  withdrawn: "vault.withdrawn",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

export interface VaultCreatedPayload {
  readonly vaultId: number;
  readonly owner: string;
}

export interface VaultDepositedPayload {
  readonly vaultId: number;
  readonly owner: string;
  readonly amount: string;
}

export interface VaultWithdrawnPayload {
  readonly vaultId: number;
  readonly owner: string;
  readonly amount: string;
}

const VAULT_EVENT_TYPES = new Set<string>(Object.values(VAULT_EVENTS));

export function isVaultEventType(value: unknown): value is VaultEventType {
  return typeof value === "string" && VAULT_EVENT_TYPES.has(value);
}

/**
 * Stream holding every event for one vault.
 */
export function vaultStreamId(vaultId: number): string {
  return `vault-${String(vaultId)}`;
}
