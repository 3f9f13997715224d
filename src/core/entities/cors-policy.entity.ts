import type { Logger } from "../ports/logger.js";
import type { OriginMatcher } from "../ports/origin-matcher.js";

/**
 * Raw CORS configuration as supplied by the caller. Every field is optional;
 * the policy compiler fills in defaults.
 */
export interface CorsOptions {
  /**
   * Origins allowed to make cross-origin requests. `"*"` allows any origin;
   * a single `*` inside an entry makes it a wildcard (`https://*.example.com`).
   * Empty means any origin.
   */
  readonly allowedOrigins?: readonly string[] | undefined;
  /** Custom origin check. When set, `allowedOrigins` is ignored. */
  readonly allowOriginFunc?: ((origin: string) => boolean) | undefined;
  /** Defaults to the simple methods: GET, POST, HEAD. */
  readonly allowedMethods?: readonly string[] | undefined;
  /** Non-simple request headers the client may send. `"*"` allows any. */
  readonly allowedHeaders?: readonly string[] | undefined;
  /** Response headers the client may read. */
  readonly exposedHeaders?: readonly string[] | undefined;
  /** Seconds a preflight result may be cached. 0 omits the header. */
  readonly maxAge?: number | undefined;
  /** Whether the request may carry cookies, HTTP auth or client certs. */
  readonly allowCredentials?: boolean | undefined;
  /** Forward preflight requests to the downstream handler too. */
  readonly optionsPassthrough?: boolean | undefined;
  /** Emit decision traces at debug level. */
  readonly debug?: boolean | undefined;
  /** Destination for debug traces; a console logger is created when omitted. */
  readonly logger?: Logger | undefined;
}

/**
 * Compiled, immutable policy. Built once, then read concurrently by every
 * request without synchronization.
 */
export interface CorsPolicy {
  readonly origins: OriginMatcher;
  readonly allowAllOrigins: boolean;
  readonly allowedMethods: readonly string[];
  readonly allowAllHeaders: boolean;
  readonly allowedHeaders: readonly string[];
  readonly exposedHeaders: readonly string[];
  readonly allowCredentials: boolean;
  readonly maxAge: number;
  readonly optionsPassthrough: boolean;
}

export const CorsHeader = {
  ORIGIN: "Origin",
  VARY: "Vary",
  REQUEST_METHOD: "Access-Control-Request-Method",
  REQUEST_HEADERS: "Access-Control-Request-Headers",
  ALLOW_ORIGIN: "Access-Control-Allow-Origin",
  ALLOW_METHODS: "Access-Control-Allow-Methods",
  ALLOW_HEADERS: "Access-Control-Allow-Headers",
  ALLOW_CREDENTIALS: "Access-Control-Allow-Credentials",
  MAX_AGE: "Access-Control-Max-Age",
  EXPOSE_HEADERS: "Access-Control-Expose-Headers",
} as const;

export type CorsHeader = (typeof CorsHeader)[keyof typeof CorsHeader];
