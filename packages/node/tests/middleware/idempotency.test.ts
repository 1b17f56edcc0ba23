/**
 * Tests for idempotency middleware.
 *
 * Verifies:
 * - POST with Idempotency-Key replays the first response
 * - A replayed withdrawal moves no value
 * - Keys are scoped to caller and path
 * - Concurrent duplicates wait for the first request
 * - Failed requests are not cached
 * - TTL expiry evicts cached entries
 */

import { describe, it, expect } from "vitest";
import { ALICE, BOB, createTestApp, jsonRequest } from "../setup.js";
import { InMemoryIdempotencyStore } from "../../src/middleware/idempotency.js";
import type { AppInstance } from "../../src/app.js";

const KEY = { "Idempotency-Key": "key-123" };

async function seedVault(instance: AppInstance): Promise<void> {
  await instance.app.request(jsonRequest("/api/v1/vaults", "POST"));
  await instance.app.request(jsonRequest("/api/v1/vaults/0/deposit", "POST", { amount: "100" }));
}

describe("idempotency middleware", () => {
  it("replays the first response for a duplicate withdrawal", async () => {
    const instance = createTestApp();
    await seedVault(instance);

    const req = () => jsonRequest("/api/v1/vaults/0/withdraw", "POST", { amount: "30" }, ALICE, KEY);

    const res1 = await instance.app.request(req());
    expect(res1.status).toBe(200);
    expect(res1.headers.get("X-Idempotent-Replay")).toBeNull();

    const res2 = await instance.app.request(req());
    expect(res2.status).toBe(200);
    expect(res2.headers.get("X-Idempotent-Replay")).toBe("true");
    expect(await res2.json()).toEqual(await res1.json());

    expect(instance.service.getVault(0).balance).toBe("70");
    expect(instance.service.payouts.paidTo(ALICE)).toBe(30n);
  });

  it("runs concurrent duplicates once and replays the rest", async () => {
    const instance = createTestApp();
    await seedVault(instance);

    const req = () => jsonRequest("/api/v1/vaults/0/withdraw", "POST", { amount: "30" }, ALICE, KEY);

    const responses = await Promise.all([
      instance.app.request(req()),
      instance.app.request(req()),
      instance.app.request(req()),
    ]);

    expect(responses.map((r) => r.status)).toEqual([200, 200, 200]);
    const replays = responses.map((r) => r.headers.get("X-Idempotent-Replay"));
    expect(replays.filter((v) => v === "true")).toHaveLength(2);
    expect(replays.filter((v) => v === null)).toHaveLength(1);

    const bodies = await Promise.all(responses.map((r) => r.json()));
    expect(bodies).toEqual([
      { data: { vaultId: 0, owner: ALICE, balance: "70" } },
      { data: { vaultId: 0, owner: ALICE, balance: "70" } },
      { data: { vaultId: 0, owner: ALICE, balance: "70" } },
    ]);
    expect(instance.service.getVault(0).balance).toBe("70");
    expect(instance.service.payouts.paidTo(ALICE)).toBe(30n);
  });

  it("lets a waiting duplicate run when the first request fails", async () => {
    const instance = createTestApp();
    await seedVault(instance);

    const req = () => jsonRequest("/api/v1/vaults/0/withdraw", "POST", { amount: "500" }, ALICE, KEY);

    const [res1, res2] = await Promise.all([
      instance.app.request(req()),
      instance.app.request(req()),
    ]);

    expect(res1.status).toBe(422);
    expect(res2.status).toBe(422);
    expect(res2.headers.get("X-Idempotent-Replay")).toBeNull();
    expect(instance.idempotencyStore.size).toBe(0);
    expect(instance.idempotencyStore.inFlight(`${ALICE}\u0000/api/v1/vaults/0/withdraw\u0000key-123`)).toBeUndefined();
    expect(instance.service.getVault(0).balance).toBe("100");
  });

  it("replays the status code of a created vault", async () => {
    const instance = createTestApp();

    const res1 = await instance.app.request(jsonRequest("/api/v1/vaults", "POST", undefined, ALICE, KEY));
    const res2 = await instance.app.request(jsonRequest("/api/v1/vaults", "POST", undefined, ALICE, KEY));

    expect(res1.status).toBe(201);
    expect(res2.status).toBe(201);
    expect(instance.service.countVaults()).toBe(1);
  });

  it("scopes keys to the caller", async () => {
    const instance = createTestApp();

    await instance.app.request(jsonRequest("/api/v1/vaults", "POST", undefined, ALICE, KEY));
    const res = await instance.app.request(jsonRequest("/api/v1/vaults", "POST", undefined, BOB, KEY));

    expect(res.headers.get("X-Idempotent-Replay")).toBeNull();
    expect(await res.json()).toEqual({ data: { vaultId: 1, owner: BOB } });
  });

  it("scopes keys to the path", async () => {
    const instance = createTestApp();
    await seedVault(instance);

    await instance.app.request(jsonRequest("/api/v1/vaults/0/deposit", "POST", { amount: "5" }, ALICE, KEY));
    const res = await instance.app.request(
      jsonRequest("/api/v1/vaults/0/withdraw", "POST", { amount: "5" }, ALICE, KEY),
    );

    expect(res.headers.get("X-Idempotent-Replay")).toBeNull();
    expect(instance.service.getVault(0).balance).toBe("100");
  });

  it("does not cache failed requests", async () => {
    const instance = createTestApp();
    await seedVault(instance);

    const res1 = await instance.app.request(
      jsonRequest("/api/v1/vaults/0/withdraw", "POST", { amount: "500" }, ALICE, KEY),
    );
    expect(res1.status).toBe(422);
    expect(instance.idempotencyStore.size).toBe(0);

    await instance.app.request(jsonRequest("/api/v1/vaults/0/deposit", "POST", { amount: "400" }));

    // Same key now succeeds against the larger balance
    const res2 = await instance.app.request(
      jsonRequest("/api/v1/vaults/0/withdraw", "POST", { amount: "500" }, ALICE, KEY),
    );
    expect(res2.status).toBe(200);
    expect(res2.headers.get("X-Idempotent-Replay")).toBeNull();
  });

  it("bypasses requests without a key", async () => {
    const instance = createTestApp();

    await instance.app.request(jsonRequest("/api/v1/vaults", "POST"));
    await instance.app.request(jsonRequest("/api/v1/vaults", "POST"));

    expect(instance.service.countVaults()).toBe(2);
    expect(instance.idempotencyStore.size).toBe(0);
  });

  it("expires entries after the TTL", async () => {
    let now = 0;
    const instance = createTestApp({ idempotencyTtlMs: 1000, now: () => now });

    await instance.app.request(jsonRequest("/api/v1/vaults", "POST", undefined, ALICE, KEY));

    now = 1001;
    const res = await instance.app.request(jsonRequest("/api/v1/vaults", "POST", undefined, ALICE, KEY));

    expect(res.headers.get("X-Idempotent-Replay")).toBeNull();
    expect(instance.service.countVaults()).toBe(2);
  });
});

describe("InMemoryIdempotencyStore", () => {
  it("keeps an entry up to the TTL and drops it after", () => {
    let now = 100;
    const store = new InMemoryIdempotencyStore({ ttlMs: 50, now: () => now });
    store.set("k", { status: 200, body: "{}", headers: {}, cachedAt: store.now() });

    now = 150;
    expect(store.get("k")?.body).toBe("{}");

    now = 151;
    expect(store.get("k")).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("sweeps expired entries when a new one is stored", () => {
    let now = 0;
    const store = new InMemoryIdempotencyStore({ ttlMs: 1000, now: () => now });
    store.set("old", { status: 200, body: "{}", headers: {}, cachedAt: store.now() });

    now = 600;
    store.set("recent", { status: 200, body: "{}", headers: {}, cachedAt: store.now() });
    expect(store.size).toBe(2);

    now = 1001;
    store.set("new", { status: 200, body: "{}", headers: {}, cachedAt: store.now() });
    expect(store.size).toBe(2);
    expect(store.get("old")).toBeUndefined();
    expect(store.get("recent")?.cachedAt).toBe(600);
  });

  it("holds a reserved key until it is released", async () => {
    const store = new InMemoryIdempotencyStore();
    const release = store.reserve("k");
    const pending = store.inFlight("k");
    expect(pending).toBeInstanceOf(Promise);

    release();
    await expect(pending).resolves.toBeUndefined();
    expect(store.inFlight("k")).toBeUndefined();
  });
});
