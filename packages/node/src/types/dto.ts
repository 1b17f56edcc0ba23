/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import { VAULT_EVENTS } from "@coffer/event-store";

// =============================================================================
// Shared Schemas
// =============================================================================

/**
 * Amounts cross the wire as base-10 integer strings in the smallest unit.
 * Zero passes here; the ledger rejects it with INVALID_AMOUNT.
 */
export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Amount must be a non-negative integer string");

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const VaultIdParamSchema = z
  .string()
  .regex(/^\d+$/, "Vault id must be a non-negative integer")
  .transform(Number);

// =============================================================================
// Vault DTOs
// =============================================================================

export const DepositSchema = z.object({
  amount: AmountSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawSchema = z.object({
  amount: AmountSchema,
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  fromPosition: z.coerce.number().int().min(1).optional(),
  type: z
    .enum([VAULT_EVENTS.created, VAULT_EVENTS.deposited, VAULT_EVENTS.withdrawn])
    .optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListVaultEventsQuerySchema = PaginationQuerySchema.extend({
  fromVersion: z.coerce.number().int().min(1).optional(),
});

export type ListVaultEventsQuery = z.infer<typeof ListVaultEventsQuerySchema>;
