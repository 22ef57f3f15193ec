/**
 * Token Module
 *
 * Claims types and the jose-backed codec used by the auth middleware.
 */

export {
  type StandardClaims,
  type Claims,
  type StandardClaimName,
  type ClaimsParser,
  type TokenKey,
  type CodecSettings,
  type VerifyOptions,
  type TokenManager,
  STANDARD_CLAIM_NAMES,
  StandardClaimsSchema,
  ClaimsSchema
} from "./types.js";

export { TokenCodec, createTokenCodec, createTypedTokenCodec, createCodecFromConfig } from "./codec.js";

export {
  type CodecOption,
  withVerifyKey,
  withAlgorithm,
  withIssuer,
  withIdGenerator,
  withClock,
  applyOptions
} from "./options.js";
