import { describe, expect, it } from "vitest";
import { z } from "zod";
import { GatehouseError } from "../src/gatehouse/errors.js";
import {
  StandardClaimsSchema,
  createTokenCodec,
  createTypedTokenCodec,
  withAlgorithm,
  withClock,
  withIdGenerator,
  withIssuer,
  withVerifyKey
} from "../src/token/index.js";

const NOW = 1695571200000;
const TEN_MINUTES = 10 * 60 * 1000;
const clock = () => NOW;

const HEADER_AND_PAYLOAD =
  "eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9.eyJ1aWQiOjEsImV4cCI6MTY5NTU3MTgwMCwiaWF0IjoxNjk1NTcxMjAwfQ";
const SIGN_KEY_TOKEN = `${HEADER_AND_PAYLOAD}.B9sIBtCtX5kp8pk0fjpcy-8HVa991qU5L5nles7Nblw`;

async function rejection(promise: Promise<unknown>): Promise<GatehouseError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof GatehouseError) return err;
    throw err;
  }
  throw new Error("expected a rejection");
}

function decodePayload(token: string): Record<string, unknown> {
  const part = token.split(".")[1] ?? "";
  return JSON.parse(Buffer.from(part, "base64url").toString("utf8"));
}

describe("TokenCodec.generate", () => {
  it("produces the expected token bytes", async () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES, withClock(clock));
    expect(await codec.generate({ uid: 1 })).toBe(SIGN_KEY_TOKEN);
  });

  it("signs the same payload differently under another key", async () => {
    const codec = createTokenCodec("access key", TEN_MINUTES, withClock(clock));
    expect(await codec.generate({ uid: 1 })).toBe(
      `${HEADER_AND_PAYLOAD}.Azhc3P_Iks_DRWRZUrZwpKWLiZ9LY7fI0BqhLzOsEgI`
    );
  });

  it("writes caller fields first, then registered claims in fixed order", async () => {
    const codec = createTokenCodec(
      "sign key",
      TEN_MINUTES,
      withClock(clock),
      withIssuer("gatehouse-test"),
      withIdGenerator(() => "id-1")
    );
    const token = await codec.generate({ sub: "user-1", role: "admin", uid: 1 });

    const payload = decodePayload(token);
    expect(Object.keys(payload)).toEqual(["role", "uid", "iss", "sub", "exp", "iat", "jti"]);
    expect(payload).toEqual({
      role: "admin",
      uid: 1,
      iss: "gatehouse-test",
      sub: "user-1",
      exp: 1695571800,
      iat: 1695571200,
      jti: "id-1"
    });
  });

  it("overrides caller-supplied exp and iat", async () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES, withClock(clock));
    const token = await codec.generate({ uid: 1, exp: 1, iat: 2 });
    expect(token).toBe(SIGN_KEY_TOKEN);
  });

  it("keeps a caller field named __proto__ as an ordinary claim", async () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES, withClock(clock));
    const claims = JSON.parse('{"uid":1,"__proto__":{"admin":true}}');
    const token = await codec.generate(claims);

    const part = token.split(".")[1] ?? "";
    expect(Buffer.from(part, "base64url").toString("utf8")).toBe(
      '{"uid":1,"__proto__":{"admin":true},"exp":1695571800,"iat":1695571200}'
    );
  });

  it("does not modify the caller's claims", async () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES, withClock(clock), withIssuer("gatehouse-test"));
    const claims = { uid: 1 };
    await codec.generate(claims);
    expect(claims).toEqual({ uid: 1 });
  });

  it("reports signing failures as GENERATION_FAILURE", async () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES, withAlgorithm("RS256"));
    const err = await rejection(codec.generate({ uid: 1 }));
    expect(err.code).toBe("GENERATION_FAILURE");
    expect(err.details).toEqual({ algorithm: "RS256" });
  });
});

describe("TokenCodec.verify", () => {
  it("decodes a valid token", async () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES, withClock(clock));
    expect(await codec.verify(SIGN_KEY_TOKEN)).toEqual({ uid: 1, exp: 1695571800, iat: 1695571200 });
  });

  it("accepts a token until the last millisecond before exp", async () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES, withClock(() => NOW + TEN_MINUTES - 1));
    await expect(codec.verify(SIGN_KEY_TOKEN)).resolves.toMatchObject({ uid: 1 });
  });

  it("rejects a token once exp is reached", async () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES, withClock(() => NOW + TEN_MINUTES));
    const err = await rejection(codec.verify(SIGN_KEY_TOKEN));
    expect(err.code).toBe("TOKEN_EXPIRED");
  });

  it("rejects a tampered signature", async () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES, withClock(clock));
    const tampered = `${HEADER_AND_PAYLOAD}.C9sIBtCtX5kp8pk0fjpcy-8HVa991qU5L5nles7Nblw`;
    const err = await rejection(codec.verify(tampered));
    expect(err.code).toBe("TOKEN_SIGNATURE_INVALID");
  });

  it("rejects a token signed with another key", async () => {
    const codec = createTokenCodec("other key", TEN_MINUTES, withClock(clock));
    const err = await rejection(codec.verify(SIGN_KEY_TOKEN));
    expect(err.code).toBe("TOKEN_SIGNATURE_INVALID");
  });

  it("rejects a token signed with another algorithm", async () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES, withClock(clock), withAlgorithm("HS384"));
    const err = await rejection(codec.verify(SIGN_KEY_TOKEN));
    expect(err.code).toBe("TOKEN_SIGNATURE_INVALID");
  });

  it("rejects malformed input", async () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES, withClock(clock));
    const err = await rejection(codec.verify("bad_token"));
    expect(err.code).toBe("TOKEN_MALFORMED");
    expect(err.isAuthError).toBe(true);
  });

  it("rejects a token before nbf", async () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES, withClock(clock));
    const token = await codec.generate({ uid: 1, nbf: NOW / 1000 + 60 });
    const err = await rejection(codec.verify(token));
    expect(err.code).toBe("TOKEN_NOT_YET_VALID");
  });

  it("returns what was generated, with the codec's stamps", async () => {
    const codec = createTokenCodec(
      "sign key",
      TEN_MINUTES,
      withClock(clock),
      withIssuer("gatehouse-test"),
      withIdGenerator(() => "id-1")
    );
    const token = await codec.generate({ uid: 1, sub: "user-1", aud: ["web", "cli"], scopes: ["read"] });

    expect(await codec.verify(token, { audience: "web" })).toEqual({
      uid: 1,
      scopes: ["read"],
      iss: "gatehouse-test",
      sub: "user-1",
      aud: ["web", "cli"],
      exp: 1695571800,
      iat: 1695571200,
      jti: "id-1"
    });
  });

  it("applies extra verify options", async () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES, withClock(clock), withIssuer("gatehouse-test"));
    const token = await codec.generate({ uid: 1 });

    await expect(codec.verify(token, { issuer: "gatehouse-test" })).resolves.toMatchObject({
      iss: "gatehouse-test"
    });
    const err = await rejection(codec.verify(token, { issuer: "someone-else" }));
    expect(err.code).toBe("CLAIMS_INVALID");
    expect(err.details?.claim).toBe("iss");
  });

  it("verifies with a separate verify key", async () => {
    const signer = createTokenCodec("sign key", TEN_MINUTES, withClock(clock));
    const token = await signer.generate({ uid: 1 });
    const verifier = createTokenCodec("unused", TEN_MINUTES, withClock(clock), withVerifyKey("sign key"));
    await expect(verifier.verify(token)).resolves.toMatchObject({ uid: 1 });
  });
});

describe("typed codecs", () => {
  const UserSchema = StandardClaimsSchema.extend({ uid: z.number().int() });

  it("returns claims of the schema's type", async () => {
    const codec = createTypedTokenCodec(UserSchema, "sign key", TEN_MINUTES, withClock(clock));
    const claims = await codec.verify(SIGN_KEY_TOKEN);
    expect(claims.uid).toBe(1);
  });

  it("rejects payloads of another shape", async () => {
    const untyped = createTokenCodec("sign key", TEN_MINUTES, withClock(clock));
    const token = await untyped.generate({ uid: "one" });

    const codec = createTypedTokenCodec(UserSchema, "sign key", TEN_MINUTES, withClock(clock));
    const err = await rejection(codec.verify(token));
    expect(err.code).toBe("CLAIMS_TYPE_MISMATCH");
  });
});

describe("TokenCodec.withOptions", () => {
  it("derives a new codec and leaves the original alone", async () => {
    const base = createTokenCodec("sign key", TEN_MINUTES, withClock(clock));
    const derived = base.withOptions(withIssuer("gatehouse-test"));

    expect(derived).not.toBe(base);
    expect(base.settings.issuer).toBe("");
    expect(derived.settings.issuer).toBe("gatehouse-test");
    expect(await base.generate({ uid: 1 })).toBe(SIGN_KEY_TOKEN);
    expect(decodePayload(await derived.generate({ uid: 1 })).iss).toBe("gatehouse-test");
  });

  it("freezes settings", () => {
    const codec = createTokenCodec("sign key", TEN_MINUTES);
    expect(Object.isFrozen(codec.settings)).toBe(true);
  });
});
