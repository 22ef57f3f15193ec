import { z } from "zod";

/**
 * Configuration schemas.
 *
 * Durations are milliseconds throughout.
 */

// ============================================================================
// Token codec
// ============================================================================

export const AlgorithmEnum = z.enum([
  "HS256", "HS384", "HS512",
  "RS256", "RS384", "RS512",
  "PS256", "PS384", "PS512",
  "ES256", "ES384", "ES512",
  "EdDSA"
]);

export type Algorithm = z.infer<typeof AlgorithmEnum>;

export const TokenCodecConfigSchema = z.object({
  /** Secret used to sign tokens (HMAC family) */
  signingKey: z.string().min(1),
  /** Secret used to verify tokens; defaults to the signing key */
  verifyKey: z.string().min(1).optional(),
  /** Token lifetime */
  expiresInMs: z.number().int().positive(),
  /** Signing algorithm */
  algorithm: AlgorithmEnum.default("HS256"),
  /** `iss` claim written into every token */
  issuer: z.string().default("")
});

export type TokenCodecConfig = z.infer<typeof TokenCodecConfigSchema>;

/** `gatehouse token issue` flags, which commander hands over as strings */
export const TokenIssueOptionsSchema = z.object({
  key: z.string().min(1),
  uid: z.coerce.number().int(),
  expiresIn: z.coerce.number().int().positive(),
  issuer: z.string()
});

export type TokenIssueOptions = z.infer<typeof TokenIssueOptionsSchema>;

// ============================================================================
// Rate limiting
// ============================================================================

export const SlidingWindowConfigSchema = z.object({
  /** Window length */
  windowMs: z.number().int().positive().default(60_000),
  /** Requests admitted per key within one window */
  max: z.number().int().positive().default(100)
});

export type SlidingWindowConfig = z.infer<typeof SlidingWindowConfigSchema>;

export const ActiveLimitConfigSchema = z.object({
  /** Concurrently outstanding requests admitted per key */
  max: z.number().int().positive().default(100)
});

export type ActiveLimitConfig = z.infer<typeof ActiveLimitConfigSchema>;

export const TokenBucketConfigSchema = z.object({
  /** Tokens the bucket holds when full */
  capacity: z.number().int().positive(),
  /** One token is added every interval */
  refillIntervalMs: z.number().int().positive(),
  /** Tokens available at construction; defaults to capacity */
  initialTokens: z.number().int().nonnegative().optional()
});

export type TokenBucketConfig = z.infer<typeof TokenBucketConfigSchema>;

// ============================================================================
// Demo server
// ============================================================================

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8080),
  access: TokenCodecConfigSchema,
  refresh: TokenCodecConfigSchema,
  /** Issue a new refresh token on every refresh */
  rotateRefreshToken: z.boolean().default(false),
  rateLimit: SlidingWindowConfigSchema.default({}),
  activeLimit: ActiveLimitConfigSchema.default({}),
  /** Token bucket in front of POST /login */
  loginBucket: TokenBucketConfigSchema.default({ capacity: 10, refillIntervalMs: 1000 }),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info")
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ServerConfigInput = z.input<typeof ServerConfigSchema>;

const MINUTE = 60_000;

const optionalInt = (value: string | undefined): number | undefined =>
  value === undefined || value === "" ? undefined : Number(value);

/**
 * Build the server configuration from `GATEHOUSE_*` environment variables.
 *
 * @throws ZodError when a variable is missing or out of range
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const issuer = env.GATEHOUSE_ISSUER ?? "";

  return ServerConfigSchema.parse({
    port: optionalInt(env.GATEHOUSE_PORT),
    access: {
      signingKey: env.GATEHOUSE_ACCESS_KEY,
      expiresInMs: optionalInt(env.GATEHOUSE_ACCESS_EXPIRES_MS) ?? 10 * MINUTE,
      issuer
    },
    refresh: {
      signingKey: env.GATEHOUSE_REFRESH_KEY,
      expiresInMs: optionalInt(env.GATEHOUSE_REFRESH_EXPIRES_MS) ?? 24 * 60 * MINUTE,
      issuer
    },
    rotateRefreshToken: env.GATEHOUSE_ROTATE_REFRESH === "true",
    rateLimit: {
      windowMs: optionalInt(env.GATEHOUSE_RATE_WINDOW_MS),
      max: optionalInt(env.GATEHOUSE_RATE_MAX)
    },
    activeLimit: {
      max: optionalInt(env.GATEHOUSE_ACTIVE_MAX)
    },
    loginBucket: {
      capacity: optionalInt(env.GATEHOUSE_LOGIN_BURST) ?? 10,
      refillIntervalMs: optionalInt(env.GATEHOUSE_LOGIN_REFILL_MS) ?? 1000
    },
    logLevel: env.GATEHOUSE_LOG_LEVEL
  });
}
