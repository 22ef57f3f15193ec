import type { Context, MiddlewareHandler, Next } from "hono";
import { defaultLogger, type Logger } from "../gatehouse/logger.js";
import { GatehouseError } from "../gatehouse/errors.js";
import { clientIpKey, globalKey } from "./keys.js";
import type { ActiveLimiter, BlockingLimiter, KeyGenerator, RateLimiter } from "./types.js";

/**
 * Rate Limiting Middleware for Hono
 *
 * Over the limit → 429. Limiter failure → 500 (requests are not let through
 * when the limiter cannot answer). Blocking wait timed out or cancelled → 504.
 */

export const DEFAULT_IP_KEY_PREFIX = "ip-limiter:";
export const DEFAULT_ACTIVE_KEY = "all_req_active_limiter";

export type RateLimitMiddlewareOptions = {
  limiter: RateLimiter;
  /** Defaults to one key per client IP */
  keyGenerator?: KeyGenerator;
  logger?: Logger;
};

/**
 * Create rate limiting middleware
 */
export function createRateLimitMiddleware(options: RateLimitMiddlewareOptions): MiddlewareHandler {
  const keyOf = options.keyGenerator ?? clientIpKey(DEFAULT_IP_KEY_PREFIX);
  const logger = options.logger ?? defaultLogger();

  return async (c: Context, next: Next) => {
    const key = keyOf(c);

    let limited: boolean;
    try {
      limited = await options.limiter.shouldLimit(key);
    } catch (err) {
      logLimiterFailure(logger, key, err);
      return c.body(null, 500);
    }

    if (limited) {
      return c.body(null, 429);
    }
    return next();
  };
}

export type ActiveLimitMiddlewareOptions = {
  limiter: ActiveLimiter;
  /** Defaults to one key for the whole service */
  keyGenerator?: KeyGenerator;
  logger?: Logger;
};

/**
 * Middleware bounding requests in flight. Admitted requests are released once
 * the rest of the chain has finished, whether it succeeded or threw.
 */
export function createActiveLimitMiddleware(options: ActiveLimitMiddlewareOptions): MiddlewareHandler {
  const keyOf = options.keyGenerator ?? globalKey(DEFAULT_ACTIVE_KEY);
  const logger = options.logger ?? defaultLogger();

  return async (c: Context, next: Next) => {
    const key = keyOf(c);

    let limited: boolean;
    try {
      limited = await options.limiter.shouldLimit(key);
    } catch (err) {
      logLimiterFailure(logger, key, err);
      return c.body(null, 500);
    }

    if (limited) {
      return c.body(null, 429);
    }

    try {
      await next();
    } finally {
      await options.limiter.release(key).catch((err: unknown) => logLimiterFailure(logger, key, err));
    }
  };
}

export type BucketLimitMiddlewareOptions = {
  limiter: BlockingLimiter;
  /** "immediate" rejects when the bucket is empty; "block" waits for a token */
  mode?: "immediate" | "block";
  /** Longest wait in "block" mode. 0 waits until the client goes away */
  waitTimeoutMs?: number;
  logger?: Logger;
};

/**
 * Middleware over a token bucket.
 */
export function createBucketLimitMiddleware(options: BucketLimitMiddlewareOptions): MiddlewareHandler {
  const mode = options.mode ?? "immediate";
  const waitTimeoutMs = options.waitTimeoutMs ?? 0;
  const logger = options.logger ?? defaultLogger();

  if (mode === "immediate") {
    return createRateLimitMiddleware({
      limiter: options.limiter,
      keyGenerator: globalKey(""),
      logger
    });
  }

  return async (c: Context, next: Next) => {
    try {
      await options.limiter.acquire({ timeoutMs: waitTimeoutMs, signal: c.req.raw.signal });
    } catch (err) {
      const error = toLimiterError(err);
      if (error.code === "LIMITER_TIMEOUT") {
        return c.body(null, 504);
      }
      logLimiterFailure(logger, "", error);
      return c.body(null, 500);
    }
    return next();
  };
}

function toLimiterError(err: unknown): GatehouseError {
  if (err instanceof GatehouseError) return err;
  const message = err instanceof Error ? err.message : "Rate limiter failed";
  return new GatehouseError("LIMITER_FAILURE", message, undefined, { cause: err });
}

function logLimiterFailure(logger: Logger, key: string, err: unknown): void {
  const error = toLimiterError(err);
  logger.error({ key, code: error.code, err: error }, "rate limiter failed");
}
