import { z } from "zod";
import type { JWTVerifyOptions, KeyLike } from "jose";
import type { Algorithm } from "../gatehouse/config.js";

/**
 * Token Types
 *
 * Claims shapes and the codec contract the middleware depend on.
 */

// ============================================================================
// Claims
// ============================================================================

/** Registered claims the codec reads and writes. Times are NumericDate seconds. */
export type StandardClaims = {
  iss?: string;
  sub?: string;
  aud?: string | string[];
  exp?: number;
  nbf?: number;
  iat?: number;
  jti?: string;
};

/** Any claims payload: the registered claims plus caller-defined data. */
export type Claims = StandardClaims & { [key: string]: unknown };

/** Serialization order of the registered claims, after the caller's own fields. */
export const STANDARD_CLAIM_NAMES = ["iss", "sub", "aud", "exp", "nbf", "iat", "jti"] as const;

export type StandardClaimName = (typeof STANDARD_CLAIM_NAMES)[number];

export const StandardClaimsSchema = z.object({
  iss: z.string().optional(),
  sub: z.string().optional(),
  aud: z.union([z.string(), z.array(z.string())]).optional(),
  exp: z.number().optional(),
  nbf: z.number().optional(),
  iat: z.number().optional(),
  jti: z.string().optional()
});

/** Default claims schema: the registered claims, anything else passed through. */
export const ClaimsSchema: ClaimsParser<Claims> = StandardClaimsSchema.passthrough();

/** A schema that turns a decoded payload into a typed claims value. */
export type ClaimsParser<T extends Claims> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ============================================================================
// Codec
// ============================================================================

/** HMAC secrets may be given as text; asymmetric keys as jose key objects. */
export type TokenKey = string | Uint8Array | KeyLike;

export type CodecSettings = {
  signingKey: TokenKey;
  /** Defaults to the signing key (symmetric algorithms) */
  verifyKey: TokenKey;
  algorithm: Algorithm;
  expiresInMs: number;
  /** Empty string leaves `iss` out of the token */
  issuer: string;
  /** Empty string leaves `jti` out of the token */
  generateId: () => string;
  /** Milliseconds since the epoch */
  clock: () => number;
};

/** Extra checks forwarded to jose, e.g. `issuer` or `audience`. */
export type VerifyOptions = Omit<JWTVerifyOptions, "algorithms" | "currentDate">;

/**
 * What the middleware need from a token codec.
 */
export interface TokenManager<T extends Claims> {
  generate(claims: T): Promise<string>;
  verify(token: string, options?: VerifyOptions): Promise<T>;
}
