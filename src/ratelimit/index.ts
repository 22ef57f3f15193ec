/**
 * Rate Limiting Module
 *
 * Sliding window, in-flight and token bucket limiters with their Hono middleware.
 */

export {
  type RateLimiter,
  type ActiveLimiter,
  type BlockingLimiter,
  type AcquireOptions,
  type KeyGenerator
} from "./types.js";

export { SlidingWindowLimiter, type SlidingWindowLimiterOptions } from "./slidingWindow.js";
export { ActiveCountLimiter, type ActiveCountLimiterOptions } from "./activeCount.js";
export { TokenBucketLimiter, type TokenBucketLimiterOptions } from "./bucket.js";
export { clientIp, clientIpKey, globalKey } from "./keys.js";

export {
  createRateLimitMiddleware,
  createActiveLimitMiddleware,
  createBucketLimitMiddleware,
  DEFAULT_IP_KEY_PREFIX,
  DEFAULT_ACTIVE_KEY,
  type RateLimitMiddlewareOptions,
  type ActiveLimitMiddlewareOptions,
  type BucketLimitMiddlewareOptions
} from "./middleware.js";
