export type GatehouseErrorCode =
  | "TOKEN_MISSING"
  | "TOKEN_MALFORMED"
  | "TOKEN_SIGNATURE_INVALID"
  | "TOKEN_EXPIRED"
  | "TOKEN_NOT_YET_VALID"
  | "CLAIMS_TYPE_MISMATCH"
  | "CLAIMS_INVALID"
  | "GENERATION_FAILURE"
  | "CLAIMS_UNAVAILABLE"
  | "RATE_LIMITED"
  | "LIMITER_FAILURE"
  | "LIMITER_TIMEOUT"
  | "LIMITER_CLOSED"
  | "BAD_REQUEST"
  | "INTERNAL";

/** Codes that mean the presented credential was not accepted. */
export const AUTH_ERROR_CODES: ReadonlySet<GatehouseErrorCode> = new Set<GatehouseErrorCode>([
  "TOKEN_MISSING",
  "TOKEN_MALFORMED",
  "TOKEN_SIGNATURE_INVALID",
  "TOKEN_EXPIRED",
  "TOKEN_NOT_YET_VALID",
  "CLAIMS_TYPE_MISMATCH",
  "CLAIMS_INVALID"
]);

export class GatehouseError extends Error {
  readonly code: GatehouseErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: GatehouseErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GatehouseError";
    this.code = code;
    this.details = details;
  }

  get isAuthError(): boolean {
    return AUTH_ERROR_CODES.has(this.code);
  }

  toJSON(): { code: GatehouseErrorCode; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

export type ErrorStatus = 400 | 401 | 429 | 500 | 504;

/**
 * HTTP status a middleware answers with for a given error code.
 * Every credential problem collapses to 401.
 */
export function httpStatusFor(code: GatehouseErrorCode): ErrorStatus {
  if (AUTH_ERROR_CODES.has(code)) return 401;
  switch (code) {
    case "RATE_LIMITED":
      return 429;
    case "LIMITER_TIMEOUT":
      return 504;
    case "BAD_REQUEST":
      return 400;
    default:
      return 500;
  }
}

export function toGatehouseError(err: unknown): GatehouseError {
  if (err instanceof GatehouseError) return err;
  if (err instanceof Error) {
    if (err.name === "ZodError") {
      const issues: unknown = "issues" in err ? err.issues : undefined;
      return new GatehouseError("BAD_REQUEST", "Validation error", { issues }, { cause: err });
    }
    return new GatehouseError("INTERNAL", err.message, { name: err.name }, { cause: err });
  }
  return new GatehouseError("INTERNAL", "Unknown error", { err });
}
