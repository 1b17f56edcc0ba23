/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps request validation failures and known domain errors
 * (VaultLedgerError, EventStoreError) to HTTP status codes.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { VaultLedgerError } from "@coffer/ledger";
import { EventStoreError } from "@coffer/event-store";
import { createErrorEnvelope, RequestValidationError } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Vault ledger errors
  NOT_FOUND: 404,
  UNAUTHORIZED: 403,
  INVALID_AMOUNT: 400,
  INSUFFICIENT_BALANCE: 422,
  TRANSFER_FAILED: 502,
  INVALID_IDENTITY: 400,
  INVALID_SNAPSHOT: 400,

  // Event store errors
  INVALID_STREAM_ID: 400,
  INVALID_VERSION: 400,
};

function getStatusCode(code: string): ContentfulStatusCode {
  return STATUS_MAP[code] ?? 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Whether the error handler answers `err` with a known code and status.
 */
export function isExpectedError(err: unknown): boolean {
  return (
    err instanceof RequestValidationError ||
    err instanceof VaultLedgerError ||
    err instanceof EventStoreError
  );
}

/**
 * Global error handler. Registered as Hono's onError handler.
 *
 * Errors that are not domain errors become 500 INTERNAL_ERROR
 * without their message.
 */
export function handleError(err: unknown, c: Context): Response {
  if (err instanceof RequestValidationError) {
    const details = err.issues.length > 0 ? { issues: err.issues } : undefined;
    return c.json(createErrorEnvelope(err.code, err.message, details), 400);
  }

  if (err instanceof VaultLedgerError || err instanceof EventStoreError) {
    const status = getStatusCode(err.code);
    const message = status === 500 ? "Internal server error" : err.message;
    return c.json(createErrorEnvelope(err.code, message), status);
  }

  return c.json(
    createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
    500,
  );
}
