import type { Context } from "hono";

/**
 * Rate Limiting Types
 *
 * Limiters answer "should this request be turned away?" for a key. They throw
 * when their backend fails; the middleware decide what that means for the
 * response.
 */

export interface RateLimiter {
  /** True when the request for `key` must be rejected. */
  shouldLimit(key: string): Promise<boolean>;
}

/**
 * Counts requests in flight. Every `shouldLimit` that returned false must be
 * followed by exactly one `release` for the same key.
 */
export interface ActiveLimiter extends RateLimiter {
  release(key: string): Promise<void>;
}

export type AcquireOptions = {
  /** Give up after this long. 0 or undefined waits until a token or abort */
  timeoutMs?: number;
  /** Give up when this fires (e.g. the client went away) */
  signal?: AbortSignal;
};

/**
 * Capacity-based limiter that can also wait for capacity.
 * Owns a background task that runs until `close()`.
 */
export interface BlockingLimiter extends RateLimiter {
  /** Resolves once a token was taken; rejects with LIMITER_TIMEOUT or LIMITER_CLOSED. */
  acquire(options?: AcquireOptions): Promise<void>;
  close(): void;
}

export type KeyGenerator = (c: Context) => string;
