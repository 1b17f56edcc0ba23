/**
 * Tests for request ID middleware.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { requestIdMiddleware, REQUEST_ID_HEADER } from "../../src/middleware/request-id.js";
import type { AppEnv } from "../../src/types/api-contract.js";

function echoApp(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware(() => "generated-id"));
  app.get("/", (c) => c.json({ requestId: c.get("requestId") }));
  return app;
}

describe("requestIdMiddleware", () => {
  it("propagates a well-formed incoming id", async () => {
    const res = await echoApp().request("/", { headers: { [REQUEST_ID_HEADER]: "trace-abc.1" } });

    expect(await res.json()).toEqual({ requestId: "trace-abc.1" });
    expect(res.headers.get(REQUEST_ID_HEADER)).toBe("trace-abc.1");
  });

  it("generates an id when none is sent", async () => {
    const res = await echoApp().request("/");

    expect(await res.json()).toEqual({ requestId: "generated-id" });
    expect(res.headers.get(REQUEST_ID_HEADER)).toBe("generated-id");
  });

  it("replaces ids with unexpected characters or length", async () => {
    const spaced = await echoApp().request("/", { headers: { [REQUEST_ID_HEADER]: "a b" } });
    expect(await spaced.json()).toEqual({ requestId: "generated-id" });

    const long = await echoApp().request("/", { headers: { [REQUEST_ID_HEADER]: "x".repeat(129) } });
    expect(await long.json()).toEqual({ requestId: "generated-id" });
  });
});
