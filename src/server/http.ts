import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { ServerConfig } from "../gatehouse/config.js";
import { GatehouseError, httpStatusFor, toGatehouseError } from "../gatehouse/errors.js";
import { createLogger, type Logger } from "../gatehouse/logger.js";
import { createAuthMiddleware, getClaims, RefreshCoordinator, type ClaimsEnv } from "../auth/index.js";
import {
  ActiveCountLimiter,
  SlidingWindowLimiter,
  TokenBucketLimiter,
  createActiveLimitMiddleware,
  createBucketLimitMiddleware,
  createRateLimitMiddleware,
  type ActiveLimiter,
  type BlockingLimiter,
  type RateLimiter
} from "../ratelimit/index.js";
import { StandardClaimsSchema, createCodecFromConfig, withClock, type CodecOption } from "../token/index.js";

// ============================================================================
// Schema Definitions
// ============================================================================

const LoginSchema = z.object({
  uid: z.number().int().positive()
});

export const UserClaimsSchema = StandardClaimsSchema.extend({
  uid: z.number().int()
});

export type UserClaims = z.infer<typeof UserClaimsSchema>;

// ============================================================================
// Configuration Types
// ============================================================================

/** Replacements for the collaborators `createApp` builds from config. */
export type AppDeps = {
  logger?: Logger;
  /** Milliseconds since the epoch, for both token codecs */
  clock?: () => number;
  rateLimiter?: RateLimiter;
  activeLimiter?: ActiveLimiter;
  loginLimiter?: BlockingLimiter;
};

export type GatehouseApp = {
  app: Hono<ClaimsEnv<UserClaims>>;
  /** Stops background limiter tasks */
  close: () => void;
};

export type RunningServer = {
  /** Resolves once the listener has stopped */
  close: () => Promise<void>;
};

// ============================================================================
// App
// ============================================================================

export function createApp(config: ServerConfig, deps: AppDeps = {}): GatehouseApp {
  const logger = deps.logger ?? createLogger({ level: config.logLevel });
  const codecOptions: CodecOption[] = deps.clock ? [withClock(deps.clock)] : [];

  const accessCodec = createCodecFromConfig(UserClaimsSchema, config.access, ...codecOptions);
  const refreshCodec = createCodecFromConfig(UserClaimsSchema, config.refresh, ...codecOptions);

  const rateLimiter = deps.rateLimiter ?? new SlidingWindowLimiter(config.rateLimit);
  const activeLimiter = deps.activeLimiter ?? new ActiveCountLimiter(config.activeLimit);
  const loginLimiter = deps.loginLimiter ?? new TokenBucketLimiter(config.loginBucket);

  const refresh = new RefreshCoordinator(accessCodec, refreshCodec, {
    rotateRefreshToken: config.rotateRefreshToken,
    logger
  });

  const app = new Hono<ClaimsEnv<UserClaims>>();

  app.onError((err, c) => {
    const error = toGatehouseError(err);
    const status = httpStatusFor(error.code);
    if (status >= 500) {
      logger.error({ code: error.code, err: error, path: c.req.path }, "request failed");
    }
    return c.json(error.toJSON(), status);
  });

  app.use("*", createRateLimitMiddleware({ limiter: rateLimiter, logger }));
  app.use("*", createActiveLimitMiddleware({ limiter: activeLimiter, logger }));

  app.get("/health", (c) => c.json({ ok: true }));

  app.post("/login", createBucketLimitMiddleware({ limiter: loginLimiter, logger }), async (c) => {
    let json: unknown;
    try {
      json = await c.req.json();
    } catch {
      return c.json({ code: "BAD_REQUEST", message: "Invalid JSON body" }, 400);
    }

    const input = LoginSchema.parse(json);
    const accessToken = await accessCodec.generate({ uid: input.uid });
    const refreshToken = await refreshCodec.generate({ uid: input.uid });

    c.header("x-access-token", accessToken);
    c.header("x-refresh-token", refreshToken);
    return c.body(null, 204);
  });

  app.get("/profile", createAuthMiddleware({ tokenManager: accessCodec, logger }), (c) => {
    const claims = getClaims(c);
    if (claims === undefined) {
      throw new GatehouseError("CLAIMS_UNAVAILABLE", "Claims missing after authentication");
    }
    return c.json({ uid: claims.uid });
  });

  app.post("/refresh-token", refresh.handler());

  return {
    app,
    close: () => {
      loginLimiter.close();
    }
  };
}

export function startHttpServer(config: ServerConfig, deps: AppDeps = {}): RunningServer {
  const logger = deps.logger ?? createLogger({ level: config.logLevel });
  const { app, close } = createApp(config, { ...deps, logger });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info({ port: info.port }, `listening on http://localhost:${info.port}`);
  });

  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        close();
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
}
