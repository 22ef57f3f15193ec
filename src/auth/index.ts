/**
 * Authentication Module
 *
 * Bearer token middleware, request-scoped claims and refresh token handling.
 */

// Claims context
export { type ClaimsEnv, type ClaimsVariables, setClaims, getClaims } from "./context.js";

// Path exemptions
export { type RequestPredicate, skipNone, matchPaths, matchRoutes, anyOf } from "./paths.js";

// Middleware
export {
  createAuthMiddleware,
  requireClaims,
  extractBearerToken,
  verifyBearer,
  type AuthMiddlewareOptions
} from "./middleware.js";

// Refresh
export {
  RefreshCoordinator,
  headerSetter,
  jsonTokenResponse,
  DEFAULT_ACCESS_HEADER,
  DEFAULT_REFRESH_HEADER,
  type IssuedTokens,
  type TokenSetter,
  type RefreshOptions
} from "./refresh.js";
