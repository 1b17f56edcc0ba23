/**
 * Vault routes.
 *
 * POST /api/v1/vaults               — Open a vault owned by the caller
 * GET  /api/v1/vaults/count         — Number of vaults ever created
 * GET  /api/v1/vaults/mine          — Ids of the caller's vaults
 * GET  /api/v1/vaults/:id           — Owner and balance of a vault
 * POST /api/v1/vaults/:id/deposit   — Credit a vault the caller owns
 * POST /api/v1/vaults/:id/withdraw  — Debit a vault and pay the caller
 * GET  /api/v1/vaults/:id/events    — Audit trail of one vault
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  DepositSchema,
  ListVaultEventsQuerySchema,
  VaultIdParamSchema,
  WithdrawSchema,
} from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { parseBody, parseParam, parseQuery } from "../middleware/validate.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/vaults — Open
  routes.post("/", (c) => {
    const service = c.get("service");
    const vault = service.createVault(c.get("caller"), c.get("requestId"));

    return c.json({ data: { vaultId: vault.vaultId, owner: vault.owner } }, 201);
  });

  // GET /api/v1/vaults/count
  routes.get("/count", (c) => {
    const service = c.get("service");
    return c.json({ data: { count: service.countVaults() } });
  });

  // GET /api/v1/vaults/mine
  routes.get("/mine", (c) => {
    const service = c.get("service");
    const vaultIds = service.vaultsOwnedBy(c.get("caller"));
    return c.json({ data: { vaultIds: [...vaultIds] } });
  });

  // GET /api/v1/vaults/:id
  routes.get("/:id", (c) => {
    const service = c.get("service");
    const vaultId = parseParam("id", c.req.param("id"), VaultIdParamSchema);

    return c.json({ data: service.getVault(vaultId) });
  });

  // POST /api/v1/vaults/:id/deposit
  routes.post("/:id/deposit", async (c) => {
    const service = c.get("service");
    const vaultId = parseParam("id", c.req.param("id"), VaultIdParamSchema);
    const body = await parseBody(c, DepositSchema);

    const vault = service.deposit(
      c.get("caller"),
      vaultId,
      body.amount,
      c.get("requestId"),
    );
    return c.json({ data: vault });
  });

  // POST /api/v1/vaults/:id/withdraw
  routes.post("/:id/withdraw", async (c) => {
    const service = c.get("service");
    const vaultId = parseParam("id", c.req.param("id"), VaultIdParamSchema);
    const body = await parseBody(c, WithdrawSchema);

    const vault = service.withdraw(
      c.get("caller"),
      vaultId,
      body.amount,
      c.get("requestId"),
    );
    return c.json({ data: vault });
  });

  // GET /api/v1/vaults/:id/events
  routes.get("/:id/events", (c) => {
    const service = c.get("service");
    const vaultId = parseParam("id", c.req.param("id"), VaultIdParamSchema);
    const query = parseQuery(c, ListVaultEventsQuerySchema);

    const events = service.readVaultEvents(
      vaultId,
      query.fromVersion !== undefined ? { fromVersion: query.fromVersion } : undefined,
    );

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.version,
      "version",
    );

    return c.json(result);
  });

  return routes;
}
