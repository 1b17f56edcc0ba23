/**
 * Audit trail routes.
 *
 * GET /api/v1/events            — All events in global order (cursor pagination)
 * GET /api/v1/events/integrity  — Hash-chain verification result
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/events — All events
  routes.get("/", (c) => {
    const service = c.get("service");
    const query = parseQuery(c, ListEventsQuerySchema);

    const events = service.readAllEvents({
      fromPosition: query.fromPosition,
      eventType: query.type,
    });

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.globalPosition,
      "globalPosition",
    );

    return c.json(result);
  });

  // GET /api/v1/events/integrity
  routes.get("/integrity", (c) => {
    const service = c.get("service");
    const integrity = service.verifyIntegrity();

    return c.json({ data: integrity });
  });

  return routes;
}
