import type { Algorithm } from "../gatehouse/config.js";
import type { CodecSettings, TokenKey } from "./types.js";

/**
 * A codec option mutates a private copy of the settings; the codec it came
 * from is never touched.
 */
export type CodecOption = (settings: CodecSettings) => void;

/** Verify with a different key than the one used to sign (key rotation, asymmetric pairs). */
export function withVerifyKey(key: TokenKey): CodecOption {
  return (settings) => {
    settings.verifyKey = key;
  };
}

export function withAlgorithm(algorithm: Algorithm): CodecOption {
  return (settings) => {
    settings.algorithm = algorithm;
  };
}

export function withIssuer(issuer: string): CodecOption {
  return (settings) => {
    settings.issuer = issuer;
  };
}

/** Source of the `jti` claim. */
export function withIdGenerator(generateId: () => string): CodecOption {
  return (settings) => {
    settings.generateId = generateId;
  };
}

/**
 * Pin the time used for stamping and verifying tokens.
 * `clock` returns milliseconds since the epoch.
 */
export function withClock(clock: () => number): CodecOption {
  return (settings) => {
    settings.clock = clock;
  };
}

export function applyOptions(
  base: Readonly<CodecSettings>,
  options: readonly CodecOption[]
): Readonly<CodecSettings> {
  const settings: CodecSettings = { ...base };
  for (const option of options) {
    option(settings);
  }
  return Object.freeze(settings);
}
