import type { Context } from "hono";
import { METHOD_NAME_ALL } from "hono/router";
import { PatternRouter } from "hono/router/pattern-router";

export type RequestPredicate = (c: Context) => boolean;

/** Never skip. */
export const skipNone: RequestPredicate = () => false;

/**
 * Matches the request path exactly, e.g. "/login".
 */
export function matchPaths(paths: Iterable<string>): RequestPredicate {
  const set = new Set(paths);
  return (c) => set.has(c.req.path);
}

/**
 * Matches route templates the way Hono routes them, e.g. "/user/:id" or "/static/*".
 */
export function matchRoutes(patterns: Iterable<string>): RequestPredicate {
  const router = new PatternRouter<true>();
  let empty = true;
  for (const pattern of patterns) {
    router.add(METHOD_NAME_ALL, pattern, true);
    empty = false;
  }
  if (empty) {
    return skipNone;
  }
  return (c) => router.match(c.req.method, c.req.path)[0].length > 0;
}

export function anyOf(...predicates: RequestPredicate[]): RequestPredicate {
  return (c) => predicates.some((predicate) => predicate(c));
}
