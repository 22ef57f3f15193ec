import type { Context, MiddlewareHandler, Next } from "hono";
import { defaultLogger, type Logger } from "../gatehouse/logger.js";
import { GatehouseError, toGatehouseError } from "../gatehouse/errors.js";
import type { Claims, TokenManager, VerifyOptions } from "../token/types.js";
import { getClaims, setClaims, type ClaimsEnv } from "./context.js";
import { anyOf, matchPaths, matchRoutes, skipNone, type RequestPredicate } from "./paths.js";

/**
 * Bearer Token Authentication Middleware for Hono
 *
 * Extracts a token from the request, verifies it and attaches the claims to
 * the request context. Every failure answers 401 with an empty body; the
 * reason is only logged.
 */

const AUTHORIZATION_HEADER = "Authorization";
const BEARER_PREFIX = "Bearer ";

export type AuthMiddlewareOptions<T extends Claims> = {
  tokenManager: TokenManager<T>;
  /** Skip authentication when this returns true */
  skip?: RequestPredicate;
  /** Skip authentication for these exact request paths */
  skipPaths?: string[];
  /** Skip authentication for these route templates (e.g. "/user/:id") */
  skipRoutes?: string[];
  /** Pull the token out of the request; empty string means no token */
  extractToken?: (c: Context) => string;
  /** Attach verified claims to the request */
  setClaims?: (c: Context<ClaimsEnv<T>>, claims: T) => void;
  /** Extra checks passed to every verification (issuer, audience...) */
  verifyOptions?: VerifyOptions;
  logger?: Logger;
};

/**
 * Creates bearer token authentication middleware
 */
export function createAuthMiddleware<T extends Claims>(
  options: AuthMiddlewareOptions<T>
): MiddlewareHandler<ClaimsEnv<T>> {
  const shouldSkip = buildSkipPredicate(options);
  const extract = options.extractToken ?? extractBearerToken;
  const attach = options.setClaims ?? setClaims;
  const logger = options.logger ?? defaultLogger();

  return async (c: Context<ClaimsEnv<T>>, next: Next) => {
    if (shouldSkip(c)) {
      return next();
    }

    const token = extract(c);
    if (token === "") {
      logger.debug({ path: c.req.path, code: "TOKEN_MISSING" }, "authentication rejected");
      return c.body(null, 401);
    }

    let claims: T;
    try {
      claims = await options.tokenManager.verify(token, options.verifyOptions);
    } catch (err) {
      const error = toGatehouseError(err);
      logger.debug({ path: c.req.path, code: error.code, reason: error.message }, "authentication rejected");
      return c.body(null, 401);
    }

    attach(c, claims);
    return next();
  };
}

/**
 * Guard for routes behind `createAuthMiddleware`: 401 without claims,
 * 403 when the predicate refuses them.
 */
export function requireClaims<T extends Claims>(
  predicate: (claims: T) => boolean,
  read: (c: Context<ClaimsEnv<T>>) => T | undefined = getClaims
): MiddlewareHandler<ClaimsEnv<T>> {
  return async (c: Context<ClaimsEnv<T>>, next: Next) => {
    const claims = read(c);
    if (claims === undefined) {
      return c.body(null, 401);
    }
    if (!predicate(claims)) {
      return c.body(null, 403);
    }
    return next();
  };
}

/**
 * Token from `Authorization: Bearer <token>`. The scheme is case sensitive;
 * anything else yields an empty string.
 */
export function extractBearerToken(c: Context): string {
  const header = c.req.header(AUTHORIZATION_HEADER);
  if (!header || !header.startsWith(BEARER_PREFIX)) {
    return "";
  }
  return header.slice(BEARER_PREFIX.length);
}

/**
 * Verify a token outside of a request, turning every failure into a
 * GatehouseError.
 */
export async function verifyBearer<T extends Claims>(
  tokenManager: TokenManager<T>,
  token: string,
  verifyOptions?: VerifyOptions
): Promise<T> {
  if (token === "") {
    throw new GatehouseError("TOKEN_MISSING", "No bearer token presented");
  }
  try {
    return await tokenManager.verify(token, verifyOptions);
  } catch (err) {
    throw toGatehouseError(err);
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

function buildSkipPredicate<T extends Claims>(options: AuthMiddlewareOptions<T>): RequestPredicate {
  const predicates: RequestPredicate[] = [];
  if (options.skip) predicates.push(options.skip);
  if (options.skipPaths?.length) predicates.push(matchPaths(options.skipPaths));
  if (options.skipRoutes?.length) predicates.push(matchRoutes(options.skipRoutes));

  if (predicates.length === 0) return skipNone;
  if (predicates.length === 1) return predicates[0];
  return anyOf(...predicates);
}
