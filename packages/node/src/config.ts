/**
 * @coffer/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Caller identity
  CALLER_HEADER: z
    .string()
    .regex(/^[A-Za-z0-9-]+$/, "Must be a valid HTTP header name")
    .default("X-Caller-Id"),

  // Payouts
  REFUSING_RECIPIENTS: z.string().default(""),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Identity List Parsing
// =============================================================================

/**
 * Parse a comma-separated identity list.
 *
 * Format: "alice,bob". Surrounding whitespace is dropped, empty entries
 * are skipped and duplicates collapse, keeping first-seen order.
 */
export function parseIdentityList(raw: string): readonly string[] {
  const identities = new Set<string>();

  for (const entry of raw.split(",")) {
    const identity = entry.trim();
    if (identity !== "") {
      identities.add(identity);
    }
  }

  return [...identities];
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
