/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Identity } from "@coffer/types";
import type { LedgerService } from "../services/ledger-service.js";

/**
 * Hono environment type for the Coffer app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The ledger service (set by app wiring) */
    service: LedgerService;

    /** Identity the request acts on behalf of (set by caller middleware) */
    caller: Identity;
  };
}
