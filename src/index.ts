/**
 * Gatehouse
 *
 * JWT authentication, refresh token handling and rate limiting for Hono.
 */

export * from "./gatehouse/errors.js";
export * from "./gatehouse/logger.js";
export * from "./gatehouse/config.js";
export * from "./token/index.js";
export * from "./auth/index.js";
export * from "./ratelimit/index.js";
export {
  createApp,
  startHttpServer,
  UserClaimsSchema,
  type UserClaims,
  type AppDeps,
  type GatehouseApp,
  type RunningServer
} from "./server/http.js";
