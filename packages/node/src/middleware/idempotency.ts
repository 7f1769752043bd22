/**
 * Idempotency middleware.
 *
 * Caches successful POST responses by Idempotency-Key header. A retried
 * submission whose first attempt committed would otherwise fail with
 * INVALID_SIGNATURES, because the nonce it was signed against is spent.
 * Failed responses are not cached: a rolled-back action may be retried.
 * A retry that arrives while the first attempt is still running waits for
 * it rather than racing it for the nonce.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Record<string, string>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: CachedResponse): void;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, CachedResponse>();
  private readonly _ttlMs: number;

  constructor(ttlMs: number = 86400000) {
    this._ttlMs = ttlMs;
  }

  get(key: string): CachedResponse | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (Date.now() - entry.cachedAt > this._ttlMs) {
      this._cache.delete(key);
      return undefined;
    }

    return entry;
  }

  set(key: string, response: CachedResponse): void {
    this.sweep(response.cachedAt);
    this._cache.set(key, response);
  }

  /** Drop every entry older than the TTL. */
  private sweep(now: number): void {
    for (const [key, entry] of this._cache) {
      if (now - entry.cachedAt > this._ttlMs) {
        this._cache.delete(key);
      }
    }
  }

  get size(): number {
    return this._cache.size;
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

function replay(cached: CachedResponse): Response {
  return new Response(cached.body, {
    status: cached.status,
    headers: { ...cached.headers, [REPLAY_HEADER]: "true" },
  });
}

/**
 * A request that finds its key in flight waits for the first request and
 * replays its response. If the first one fails, the waiter runs itself.
 */
export function idempotencyMiddleware(
  store: IdempotencyStore,
): MiddlewareHandler<AppEnv> {
  const inFlight = new Map<string, Promise<CachedResponse | undefined>>();

  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined) {
      return next();
    }

    // Keys are scoped to the route so one key cannot replay another endpoint's answer.
    const cacheKey = `${c.req.path}:${idempotencyKey}`;
    const cached = store.get(cacheKey) ?? (await inFlight.get(cacheKey));
    if (cached !== undefined) {
      return replay(cached);
    }

    let settle: (entry: CachedResponse | undefined) => void = () => undefined;
    inFlight.set(
      cacheKey,
      new Promise<CachedResponse | undefined>((resolve) => {
        settle = resolve;
      }),
    );

    let entry: CachedResponse | undefined;
    try {
      await next();

      if (c.res.status < 400) {
        const clonedRes = c.res.clone();
        const body = await clonedRes.text();
        const headers: Record<string, string> = {};
        clonedRes.headers.forEach((value, key) => {
          headers[key] = value;
        });

        entry = {
          status: clonedRes.status,
          body,
          headers,
          cachedAt: Date.now(),
        };
        store.set(cacheKey, entry);
      }
    } finally {
      inFlight.delete(cacheKey);
      settle(entry);
    }
  };
}
