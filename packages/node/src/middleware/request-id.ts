/**
 * Request ID middleware.
 *
 * Propagates an incoming X-Request-Id when it is a plain token of at
 * most 128 characters; otherwise generates a UUID. The id is echoed on
 * the response and becomes the correlation id of any events the request
 * records.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export function requestIdMiddleware(
  generate: () => string = randomUUID,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const existing = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      existing !== undefined && REQUEST_ID_PATTERN.test(existing)
        ? existing
        : generate();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
