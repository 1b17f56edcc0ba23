/**
 * Identity Types
 *
 * Who is calling, and which vault they are talking about.
 *
 * Rules:
 * - The caller identity is always passed explicitly, never read from
 *   ambient process state
 * - Vault ids are positions in the ledger's append-only sequence
 */

/**
 * The principal on whose behalf a ledger operation is invoked.
 * Opaque to the ledger: compared by value, never interpreted.
 */
export type Identity = string;

/**
 * Position of a vault in the global vault sequence (0-based, dense).
 */
export type VaultId = number;
