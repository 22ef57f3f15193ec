import { describe, expect, it } from "vitest";
import { createCodecFromConfig } from "../src/token/codec.js";
import { ClaimsSchema } from "../src/token/types.js";
import {
  applyOptions,
  withAlgorithm,
  withClock,
  withIdGenerator,
  withIssuer,
  withVerifyKey
} from "../src/token/options.js";
import { TokenCodecConfigSchema } from "../src/gatehouse/config.js";
import type { CodecSettings } from "../src/token/types.js";

const base: CodecSettings = {
  signingKey: "sign key",
  verifyKey: "sign key",
  algorithm: "HS256",
  expiresInMs: 1000,
  issuer: "",
  generateId: () => "",
  clock: () => 0
};

describe("applyOptions", () => {
  it("applies options in order to a frozen copy", () => {
    const settings = applyOptions(base, [withIssuer("first"), withIssuer("second"), withAlgorithm("HS512")]);
    expect(settings.issuer).toBe("second");
    expect(settings.algorithm).toBe("HS512");
    expect(Object.isFrozen(settings)).toBe(true);
    expect(base.issuer).toBe("");
    expect(base.algorithm).toBe("HS256");
  });

  it("sets the verify key, id generator and clock", () => {
    const settings = applyOptions(base, [
      withVerifyKey("verify key"),
      withIdGenerator(() => "id-1"),
      withClock(() => 42)
    ]);
    expect(settings.verifyKey).toBe("verify key");
    expect(settings.signingKey).toBe("sign key");
    expect(settings.generateId()).toBe("id-1");
    expect(settings.clock()).toBe(42);
  });
});

describe("createCodecFromConfig", () => {
  it("carries configuration into the settings", () => {
    const config = TokenCodecConfigSchema.parse({
      signingKey: "sign key",
      verifyKey: "verify key",
      expiresInMs: 5000,
      algorithm: "HS384",
      issuer: "gatehouse-test"
    });
    const codec = createCodecFromConfig(ClaimsSchema, config, withIssuer("override"));

    expect(codec.settings.signingKey).toBe("sign key");
    expect(codec.settings.verifyKey).toBe("verify key");
    expect(codec.settings.expiresInMs).toBe(5000);
    expect(codec.settings.algorithm).toBe("HS384");
    expect(codec.settings.issuer).toBe("override");
  });

  it("verifies with the signing key when no verify key is configured", () => {
    const config = TokenCodecConfigSchema.parse({ signingKey: "sign key", expiresInMs: 5000 });
    const codec = createCodecFromConfig(ClaimsSchema, config);
    expect(codec.settings.verifyKey).toBe("sign key");
    expect(codec.settings.issuer).toBe("");
  });
});
