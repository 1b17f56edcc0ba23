/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separate from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { LedgerService } from "./services/ledger-service.js";
import type { LedgerServiceConfig } from "./services/ledger-service.js";
import { handleError, isExpectedError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { callerMiddleware, DEFAULT_CALLER_HEADER } from "./middleware/caller.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import { createHealthRoutes } from "./routes/health.js";
import { createVaultRoutes } from "./routes/vaults.js";
import { createEventRoutes } from "./routes/events.js";
import { createErrorEnvelope } from "./types/error.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: LedgerServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Header naming the caller identity. Default: X-Caller-Id */
  readonly callerHeader?: string | undefined;
  readonly idempotencyTtlMs?: number | undefined;
  /** Millisecond clock for idempotency expiry. Default: Date.now */
  readonly now?: (() => number) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: LedgerService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new LedgerService(options.serviceConfig);
  const logger = options.serviceConfig.logger;
  const idempotencyStore = new InMemoryIdempotencyStore({
    ttlMs: options.idempotencyTtlMs,
    now: options.now,
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError((err, c) => {
    if (!isExpectedError(err)) {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled request error");
    }
    return handleError(err, c);
  });

  app.notFound((c) =>
    c.json(
      createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
      404,
    ),
  );

  // ─── Health Routes (no caller required) ─────────────────────────
  app.route("/", createHealthRoutes(service, options.serviceConfig.clock));

  // ─── API Routes ─────────────────────────────────────────────────
  // caller → service → idempotency
  app.use("/api/*", callerMiddleware(options.callerHeader ?? DEFAULT_CALLER_HEADER));
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  // Mount v1 API routes
  app.route("/api/v1/vaults", createVaultRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service, idempotencyStore };
}
