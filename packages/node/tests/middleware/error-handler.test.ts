/**
 * Tests for the global error handler.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { VaultLedgerError } from "@coffer/ledger";
import type { VaultLedgerErrorCode } from "@coffer/ledger";
import { EventStoreError } from "@coffer/event-store";
import { handleError, isExpectedError } from "../../src/middleware/error-handler.js";
import { RequestValidationError } from "../../src/types/error.js";
import { createTestApp, jsonRequest } from "../setup.js";

function appThrowing(err: Error): Hono {
  const app = new Hono();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("handleError", () => {
  it.each<[VaultLedgerErrorCode, number]>([
    ["NOT_FOUND", 404],
    ["UNAUTHORIZED", 403],
    ["INVALID_AMOUNT", 400],
    ["INSUFFICIENT_BALANCE", 422],
    ["TRANSFER_FAILED", 502],
    ["INVALID_IDENTITY", 400],
    ["INVALID_SNAPSHOT", 400],
  ])("maps %s to %i", async (code, status) => {
    const res = await appThrowing(new VaultLedgerError(code, "boom")).request("/boom");

    expect(res.status).toBe(status);
    expect(await res.json()).toEqual({ error: { code, message: "boom" } });
  });

  it("maps event store read errors to 400", async () => {
    const err = new EventStoreError("INVALID_VERSION", "fromVersion must be >= 1, got 0", "vault-0");
    const res = await appThrowing(err).request("/boom");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "INVALID_VERSION", message: "fromVersion must be >= 1, got 0" },
    });
  });

  it("includes validation issues", async () => {
    const err = new RequestValidationError("Request body validation failed", [
      { path: "amount", message: "Required" },
    ]);
    const res = await appThrowing(err).request("/boom");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Request body validation failed",
        details: { issues: [{ path: "amount", message: "Required" }] },
      },
    });
  });

  it("hides the message of unexpected errors", async () => {
    const res = await appThrowing(new TypeError("secret detail")).request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });

  it("does not trust a code property on foreign errors", async () => {
    const foreign = Object.assign(new Error("nope"), { code: "NOT_FOUND" });
    const res = await appThrowing(foreign).request("/boom");

    expect(res.status).toBe(500);
  });
});

describe("isExpectedError", () => {
  it("recognizes domain and validation errors only", () => {
    expect(isExpectedError(new VaultLedgerError("NOT_FOUND", "x"))).toBe(true);
    expect(isExpectedError(new EventStoreError("INVALID_STREAM_ID", "x"))).toBe(true);
    expect(isExpectedError(new RequestValidationError("x"))).toBe(true);
    expect(isExpectedError(new Error("x"))).toBe(false);
  });
});

describe("unknown routes", () => {
  it("returns a NOT_FOUND envelope", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/nothing-here"));

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "NOT_FOUND", message: "No route for GET /api/v1/nothing-here" },
    });
  });
});
