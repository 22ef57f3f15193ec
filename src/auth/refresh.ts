import type { Context, Handler, MiddlewareHandler } from "hono";
import { defaultLogger, type Logger } from "../gatehouse/logger.js";
import { toGatehouseError } from "../gatehouse/errors.js";
import type { Claims, TokenManager } from "../token/types.js";
import { getClaims, type ClaimsEnv } from "./context.js";
import { createAuthMiddleware } from "./middleware.js";

/**
 * Refresh Token Handling
 *
 * Authenticates a refresh token, then issues a new access token and, when
 * rotation is on, a new refresh token.
 */

export const DEFAULT_ACCESS_HEADER = "x-access-token";
export const DEFAULT_REFRESH_HEADER = "x-refresh-token";

export type IssuedTokens = {
  accessToken: string;
  /** Present only when the refresh token was rotated */
  refreshToken?: string;
};

export type TokenSetter = (c: Context, token: string) => void;

export type RefreshOptions<T extends Claims> = {
  /** Issue a new refresh token on every refresh. Default false */
  rotateRefreshToken?: boolean;
  /**
   * Authenticates the refresh token. Defaults to `createAuthMiddleware` bound
   * to the refresh token manager. If it stores claims somewhere other than
   * `setClaims`, `getClaims` must read them from there.
   */
  authHandler?: MiddlewareHandler<ClaimsEnv<T>>;
  getClaims?: (c: Context<ClaimsEnv<T>>) => T | undefined;
  /** Response header for the access token when `setAccessToken` is not given */
  accessHeader?: string;
  /** Response header for the refresh token when `setRefreshToken` is not given */
  refreshHeader?: string;
  setAccessToken?: TokenSetter;
  setRefreshToken?: TokenSetter;
  /** Final response. Defaults to an empty 204 */
  respond?: (c: Context<ClaimsEnv<T>>, tokens: IssuedTokens) => Response | Promise<Response>;
  logger?: Logger;
};

export class RefreshCoordinator<T extends Claims> {
  private readonly accessManager: TokenManager<T>;
  private readonly refreshManager: TokenManager<T>;
  private readonly options: Readonly<RefreshOptions<T>>;

  private readonly rotate: boolean;
  private readonly authHandler: MiddlewareHandler<ClaimsEnv<T>>;
  private readonly readClaims: (c: Context<ClaimsEnv<T>>) => T | undefined;
  private readonly setAccessToken: TokenSetter;
  private readonly setRefreshToken: TokenSetter;
  private readonly respond: (c: Context<ClaimsEnv<T>>, tokens: IssuedTokens) => Response | Promise<Response>;
  private readonly logger: Logger;

  constructor(
    accessManager: TokenManager<T>,
    refreshManager: TokenManager<T>,
    options: RefreshOptions<T> = {}
  ) {
    this.accessManager = accessManager;
    this.refreshManager = refreshManager;
    this.options = Object.freeze({ ...options });

    this.logger = options.logger ?? defaultLogger();
    this.rotate = options.rotateRefreshToken ?? false;
    this.authHandler = options.authHandler ?? createAuthMiddleware({
      tokenManager: refreshManager,
      logger: this.logger
    });
    this.readClaims = options.getClaims ?? getClaims;
    this.setAccessToken = options.setAccessToken ?? headerSetter(options.accessHeader ?? DEFAULT_ACCESS_HEADER);
    this.setRefreshToken = options.setRefreshToken ?? headerSetter(options.refreshHeader ?? DEFAULT_REFRESH_HEADER);
    this.respond = options.respond ?? ((c) => c.body(null, 204));
  }

  get rotatesRefreshToken(): boolean {
    return this.rotate;
  }

  /**
   * A new coordinator with these options layered over the current ones.
   */
  withOptions(options: RefreshOptions<T>): RefreshCoordinator<T> {
    return new RefreshCoordinator(this.accessManager, this.refreshManager, {
      ...this.options,
      ...options
    });
  }

  /**
   * Hono handler for the refresh route.
   */
  handler(): Handler<ClaimsEnv<T>> {
    return (c) => this.handle(c);
  }

  async handle(c: Context<ClaimsEnv<T>>): Promise<Response> {
    const auth = { passed: false };
    const rejection = await this.authHandler(c, async () => {
      auth.passed = true;
    });
    if (!auth.passed) {
      return rejection ?? c.body(null, 401);
    }

    const claims = this.readClaims(c);
    if (claims === undefined) {
      // Only reachable when authHandler and getClaims disagree on where claims live
      this.logger.error({ code: "CLAIMS_UNAVAILABLE", path: c.req.path }, "refresh claims not found on request");
      return c.body(null, 500);
    }

    let accessToken: string;
    try {
      accessToken = await this.accessManager.generate(claims);
    } catch (err) {
      const error = toGatehouseError(err);
      this.logger.error({ code: error.code, err: error }, "failed to generate access token");
      return c.body(null, 500);
    }
    this.setAccessToken(c, accessToken);

    if (!this.rotate) {
      return this.respond(c, { accessToken });
    }

    let refreshToken: string;
    try {
      refreshToken = await this.refreshManager.generate(claims);
    } catch (err) {
      // The access token header is already set; it is not withdrawn.
      const error = toGatehouseError(err);
      this.logger.error({ code: error.code, err: error }, "failed to generate refresh token");
      return c.body(null, 500);
    }
    this.setRefreshToken(c, refreshToken);

    return this.respond(c, { accessToken, refreshToken });
  }
}

export function headerSetter(name: string): TokenSetter {
  return (c, token) => {
    c.header(name, token);
  };
}

/**
 * Respond with the issued tokens as a JSON body instead of headers.
 * Pair with no-op token setters.
 */
export function jsonTokenResponse<T extends Claims>(c: Context<ClaimsEnv<T>>, tokens: IssuedTokens): Response {
  return c.json(tokens, 200);
}
