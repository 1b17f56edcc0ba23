/**
 * @coffer/node — Entry point.
 *
 * Loads config, builds the ledger service and Hono app, starts the
 * HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseIdentityList } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const refusingRecipients = parseIdentityList(config.REFUSING_RECIPIENTS);
  if (refusingRecipients.length > 0) {
    logger.info({ refusingRecipients }, "Payouts refused for configured recipients");
  }

  const { app, service } = createApp({
    serviceConfig: {
      logger: logger.child({ component: "ledger" }),
      refusingRecipients,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    callerHeader: config.CALLER_HEADER,
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, callerHeader: config.CALLER_HEADER },
    "Coffer node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.stop();
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      logger.info(
        { vaults: service.countVaults(), events: service.eventCount() },
        "Shutdown complete",
      );
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
