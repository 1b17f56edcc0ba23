/**
 * Caller identity middleware.
 *
 * Every API request acts on behalf of the identity named in the caller
 * header. The identity is passed explicitly to each ledger operation;
 * requests without it are rejected with 401 MISSING_CALLER.
 */

import type { MiddlewareHandler } from "hono";
import { isIdentity } from "@coffer/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const DEFAULT_CALLER_HEADER = "X-Caller-Id";

export function callerMiddleware(
  headerName: string = DEFAULT_CALLER_HEADER,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const caller = c.req.header(headerName)?.trim();
    if (!isIdentity(caller)) {
      return c.json(
        createErrorEnvelope("MISSING_CALLER", `Missing ${headerName} header`),
        401,
      );
    }

    c.set("caller", caller);
    return next();
  };
}
