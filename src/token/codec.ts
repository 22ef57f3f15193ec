import { SignJWT, errors, jwtVerify, type JWTPayload, type KeyLike } from "jose";
import { GatehouseError } from "../gatehouse/errors.js";
import type { TokenCodecConfig } from "../gatehouse/config.js";
import { applyOptions, withAlgorithm, withIssuer, withVerifyKey, type CodecOption } from "./options.js";
import {
  ClaimsSchema,
  STANDARD_CLAIM_NAMES,
  type Claims,
  type ClaimsParser,
  type CodecSettings,
  type TokenKey,
  type TokenManager,
  type VerifyOptions
} from "./types.js";

/**
 * Token Codec
 *
 * Signs claims into compact JWS tokens and verifies them back, on top of jose.
 * A codec holds no mutable state, so one instance can serve every request.
 */

const STANDARD_CLAIMS: ReadonlySet<string> = new Set<string>(STANDARD_CLAIM_NAMES);

const encoder = new TextEncoder();

export class TokenCodec<T extends Claims> implements TokenManager<T> {
  readonly settings: Readonly<CodecSettings>;
  private readonly schema: ClaimsParser<T>;

  constructor(schema: ClaimsParser<T>, settings: Readonly<CodecSettings>) {
    this.schema = schema;
    this.settings = settings;
  }

  /**
   * A copy of this codec with the options applied on top of its settings.
   */
  withOptions(...options: CodecOption[]): TokenCodec<T> {
    return new TokenCodec(this.schema, applyOptions(this.settings, options));
  }

  /**
   * Stamp `iss`, `exp`, `iat` and `jti` onto a copy of the claims and sign it.
   *
   * @throws GatehouseError GENERATION_FAILURE when jose cannot sign
   */
  async generate(claims: T): Promise<string> {
    const now = this.settings.clock();
    const payload = layoutPayload(claims, {
      iss: this.settings.issuer,
      exp: toNumericDate(now + this.settings.expiresInMs),
      iat: toNumericDate(now),
      jti: this.settings.generateId()
    });

    try {
      return await new SignJWT(payload)
        .setProtectedHeader({ alg: this.settings.algorithm, typ: "JWT" })
        .sign(toKey(this.settings.signingKey));
    } catch (err) {
      throw new GatehouseError(
        "GENERATION_FAILURE",
        "Failed to sign token",
        { algorithm: this.settings.algorithm },
        { cause: err }
      );
    }
  }

  /**
   * Verify signature, `exp` and `nbf` against the codec's clock and decode the claims.
   *
   * @throws GatehouseError classifying why the token was refused
   */
  async verify(token: string, options?: VerifyOptions): Promise<T> {
    let payload: JWTPayload;
    try {
      const result = await jwtVerify(token, toKey(this.settings.verifyKey), {
        ...options,
        algorithms: [this.settings.algorithm],
        currentDate: new Date(this.settings.clock())
      });
      payload = result.payload;
    } catch (err) {
      throw classifyVerifyError(err);
    }

    const parsed = this.schema.safeParse(payload);
    if (!parsed.success) {
      throw new GatehouseError(
        "CLAIMS_TYPE_MISMATCH",
        "Token claims do not match the expected shape",
        { issues: parsed.error.issues }
      );
    }
    return parsed.data;
  }
}

/**
 * Create a codec for untyped claims.
 * Defaults: HS256, verify key equal to the signing key, no issuer, no `jti`, `Date.now`.
 */
export function createTokenCodec(
  signingKey: TokenKey,
  expiresInMs: number,
  ...options: CodecOption[]
): TokenCodec<Claims> {
  return createTypedTokenCodec(ClaimsSchema, signingKey, expiresInMs, ...options);
}

/**
 * Create a codec whose `verify` validates and returns claims of the schema's type.
 */
export function createTypedTokenCodec<T extends Claims>(
  schema: ClaimsParser<T>,
  signingKey: TokenKey,
  expiresInMs: number,
  ...options: CodecOption[]
): TokenCodec<T> {
  const defaults: CodecSettings = {
    signingKey,
    verifyKey: signingKey,
    algorithm: "HS256",
    expiresInMs,
    issuer: "",
    generateId: () => "",
    clock: Date.now
  };
  return new TokenCodec(schema, applyOptions(defaults, options));
}

/**
 * Create a codec from validated configuration; `options` are applied last.
 */
export function createCodecFromConfig<T extends Claims>(
  schema: ClaimsParser<T>,
  config: TokenCodecConfig,
  ...options: CodecOption[]
): TokenCodec<T> {
  const fromConfig: CodecOption[] = [withAlgorithm(config.algorithm), withIssuer(config.issuer)];
  if (config.verifyKey !== undefined) {
    fromConfig.push(withVerifyKey(config.verifyKey));
  }
  return createTypedTokenCodec(schema, config.signingKey, config.expiresInMs, ...fromConfig, ...options);
}

// ============================================================================
// Helper Functions
// ============================================================================

function toNumericDate(ms: number): number {
  return Math.floor(ms / 1000);
}

function toKey(key: TokenKey): Uint8Array | KeyLike {
  return typeof key === "string" ? encoder.encode(key) : key;
}

type StampedClaims = { iss: string; exp: number; iat: number; jti: string };

/**
 * Caller fields first, in their own order, then the registered claims in a
 * fixed order. Empty strings and undefined values are left out, so the same
 * claims and settings always produce the same token bytes.
 */
function layoutPayload(claims: Claims, stamped: StampedClaims): JWTPayload {
  const payload: JWTPayload = {};

  for (const [name, value] of Object.entries(claims)) {
    if (!STANDARD_CLAIMS.has(name) && value !== undefined) {
      // plain assignment of "__proto__" would replace the prototype
      Object.defineProperty(payload, name, { value, enumerable: true, writable: true, configurable: true });
    }
  }

  if (stamped.iss !== "") payload.iss = stamped.iss;
  if (claims.sub !== undefined) payload.sub = claims.sub;
  if (claims.aud !== undefined) payload.aud = claims.aud;
  payload.exp = stamped.exp;
  if (claims.nbf !== undefined) payload.nbf = claims.nbf;
  payload.iat = stamped.iat;
  if (stamped.jti !== "") payload.jti = stamped.jti;

  return payload;
}

function classifyVerifyError(err: unknown): GatehouseError {
  if (err instanceof errors.JWTExpired) {
    return new GatehouseError("TOKEN_EXPIRED", "Token has expired", undefined, { cause: err });
  }
  if (err instanceof errors.JWTClaimValidationFailed) {
    if (err.claim === "nbf") {
      return new GatehouseError("TOKEN_NOT_YET_VALID", "Token not yet valid", undefined, { cause: err });
    }
    return new GatehouseError(
      "CLAIMS_INVALID",
      `Token claim check failed: ${err.claim}`,
      { claim: err.claim, reason: err.reason },
      { cause: err }
    );
  }
  if (err instanceof errors.JWSSignatureVerificationFailed || err instanceof errors.JOSEAlgNotAllowed) {
    return new GatehouseError("TOKEN_SIGNATURE_INVALID", "Token signature is invalid", undefined, { cause: err });
  }
  if (err instanceof errors.JWSInvalid || err instanceof errors.JWTInvalid) {
    return new GatehouseError("TOKEN_MALFORMED", "Malformed token", undefined, { cause: err });
  }
  if (err instanceof Error) {
    return new GatehouseError("TOKEN_MALFORMED", err.message, { name: err.name }, { cause: err });
  }
  return new GatehouseError("TOKEN_MALFORMED", "Token could not be verified", { err });
}
