import { IncomingMessage } from "node:http";
import type { Context } from "hono";
import type { KeyGenerator } from "./types.js";

/**
 * Client address: first X-Forwarded-For hop, then X-Real-IP, then the socket
 * address when served by @hono/node-server.
 */
export function clientIp(c: Context): string {
  const forwarded = c.req.header("X-Forwarded-For")?.split(",")[0]?.trim();
  if (forwarded) {
    return forwarded;
  }
  const realIp = c.req.header("X-Real-IP")?.trim();
  if (realIp) {
    return realIp;
  }
  return socketAddress(c.env) ?? "unknown";
}

/** One key per client address, e.g. "ip-limiter:10.0.0.1". */
export function clientIpKey(prefix = "ip-limiter:"): KeyGenerator {
  return (c) => `${prefix}${clientIp(c)}`;
}

/** The same key for every request: limits the service as a whole. */
export function globalKey(name: string): KeyGenerator {
  return () => name;
}

function socketAddress(env: unknown): string | undefined {
  if (typeof env !== "object" || env === null || !("incoming" in env)) {
    return undefined;
  }
  const incoming = env.incoming;
  return incoming instanceof IncomingMessage ? incoming.socket.remoteAddress : undefined;
}
