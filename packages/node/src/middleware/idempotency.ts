/**
 * Idempotency middleware.
 *
 * Caches successful POST responses by Idempotency-Key header, scoped to
 * the caller and the request path. A retried deposit or withdrawal with
 * the same key replays the cached response instead of moving value twice.
 *
 * A key is reserved while its first request runs. Duplicates that arrive
 * meanwhile wait for it, then replay its response, or run themselves if
 * it failed.
 */

import type { MiddlewareHandler } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly status: ContentfulStatusCode;
  readonly body: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: CachedResponse): void;
  /** Settles when the request holding `key` finishes. Undefined if none. */
  inFlight(key: string): Promise<void> | undefined;
  /** Hold `key` until the returned release function is called. */
  reserve(key: string): () => void;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export interface InMemoryIdempotencyStoreOptions {
  /** How long a cached response is replayed. Default: 24h. */
  readonly ttlMs?: number | undefined;
  /** Millisecond clock. Default: Date.now. */
  readonly now?: (() => number) | undefined;
}

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, CachedResponse>();
  private readonly _inFlight = new Map<string, Promise<void>>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;

  constructor(options?: InMemoryIdempotencyStoreOptions) {
    this._ttlMs = options?.ttlMs ?? 86400000;
    this._now = options?.now ?? Date.now;
  }

  get(key: string): CachedResponse | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (this._isExpired(entry, this._now())) {
      this._cache.delete(key);
      return undefined;
    }

    return entry;
  }

  set(key: string, response: CachedResponse): void {
    const now = this._now();
    for (const [cachedKey, entry] of this._cache) {
      if (this._isExpired(entry, now)) {
        this._cache.delete(cachedKey);
      }
    }
    this._cache.set(key, response);
  }

  inFlight(key: string): Promise<void> | undefined {
    return this._inFlight.get(key);
  }

  reserve(key: string): () => void {
    let settle: () => void = () => {};
    const done = new Promise<void>((resolve) => {
      settle = resolve;
    });
    this._inFlight.set(key, done);

    return () => {
      if (this._inFlight.get(key) === done) {
        this._inFlight.delete(key);
      }
      settle();
    };
  }

  /** Current time on the store's clock, used to stamp entries. */
  now(): number {
    return this._now();
  }

  get size(): number {
    return this._cache.size;
  }

  clear(): void {
    this._cache.clear();
  }

  private _isExpired(entry: CachedResponse, now: number): boolean {
    return now - entry.cachedAt > this._ttlMs;
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const IDEMPOTENT_REPLAY_HEADER = "X-Idempotent-Replay";

/**
 * Must run after the caller middleware: cache keys include the caller.
 */
export function idempotencyMiddleware(
  store: InMemoryIdempotencyStore,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined || idempotencyKey === "") {
      return next();
    }

    const cacheKey = `${c.get("caller")}\u0000${c.req.path}\u0000${idempotencyKey}`;

    // Check and reserve without an await in between, so only one
    // request per key reaches the handler at a time.
    for (;;) {
      const cached = store.get(cacheKey);
      if (cached !== undefined) {
        for (const [key, value] of Object.entries(cached.headers)) {
          c.header(key, value);
        }
        c.header(IDEMPOTENT_REPLAY_HEADER, "true");
        return c.body(cached.body, cached.status);
      }

      const pending = store.inFlight(cacheKey);
      if (pending === undefined) {
        break;
      }
      await pending;
    }

    const release = store.reserve(cacheKey);
    try {
      await next();

      if (c.res.status < 400) {
        const clonedRes = c.res.clone();
        const body = await clonedRes.text();
        const headers: Record<string, string> = {};
        clonedRes.headers.forEach((value, key) => {
          headers[key] = value;
        });

        store.set(cacheKey, {
          status: c.res.status as ContentfulStatusCode,
          body,
          headers,
          cachedAt: store.now(),
        });
      }
    } finally {
      release();
    }
  };
}
