/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (service running and audit chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LedgerService } from "../services/ledger-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(
  service: LedgerService,
  clock: () => string = () => new Date().toISOString(),
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: clock(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyIntegrity();
    const ready = service.isReady();

    const eventStore: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : { status: "down", detail: `chainValid=false, errors=${integrity.errors.length}` };

    const body = {
      status: ready ? "ready" : "not_ready",
      vaults: service.countVaults(),
      events: service.eventCount(),
      subsystems: { eventStore },
      timestamp: clock(),
    };

    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
