import type { Context } from "hono";
import type { Claims } from "../token/types.js";

/**
 * Request-scoped claims.
 *
 * The auth middleware stores verified claims in the request's Hono context;
 * each request has its own context, so nothing is shared between requests.
 */

export type ClaimsVariables<T extends Claims> = {
  tokenClaims: T;
};

/** Hono environment carrying verified claims. */
export type ClaimsEnv<T extends Claims> = {
  Variables: ClaimsVariables<T>;
};

export function setClaims<T extends Claims>(c: Context<ClaimsEnv<T>>, claims: T): void {
  c.set("tokenClaims", claims);
}

/**
 * Claims attached by `setClaims`, or undefined when the request was not
 * authenticated (or the middleware stored them elsewhere).
 */
export function getClaims<T extends Claims>(c: Context<ClaimsEnv<T>>): T | undefined {
  return c.get("tokenClaims");
}
