import type { CorsOptions, CorsPolicy } from "../../core/entities/cors-policy.entity.js";
import type { OriginMatcher } from "../../core/ports/origin-matcher.js";
import { canonicalHeaderKey, convert } from "../../shared/utils/header-list.js";
import { type Wildcard, wildcardFromPattern } from "../../shared/utils/wildcard.js";
import { anyOrigin, listedOrigins, predicateOrigins } from "./origin-matchers.js";

export const DEFAULT_ALLOWED_HEADERS: readonly string[] = Object.freeze([
  "Origin",
  "Accept",
  "Content-Type",
  "X-Requested-With",
]);

export const DEFAULT_ALLOWED_METHODS: readonly string[] = Object.freeze(["GET", "POST", "HEAD"]);

/** Every field left at its default. */
export const defaultOptions = (): CorsOptions => ({});

/** Any origin, the common methods, any header, credentials allowed. */
export const allowAllOptions = (): CorsOptions => ({
  allowedOrigins: ["*"],
  allowedMethods: ["HEAD", "GET", "POST", "PUT", "PATCH", "DELETE"],
  allowedHeaders: ["*"],
  allowCredentials: true,
});

const compileOrigins = (options: CorsOptions): OriginMatcher => {
  if (options.allowOriginFunc) return predicateOrigins(options.allowOriginFunc);

  const configured = options.allowedOrigins ?? [];
  if (configured.length === 0) return anyOrigin;

  const exact: string[] = [];
  const wildcards: Wildcard[] = [];
  for (const entry of configured) {
    const origin = entry.toLowerCase();
    if (origin === "*") return anyOrigin;
    const w = wildcardFromPattern(origin);
    if (w) {
      wildcards.push(w);
    } else {
      exact.push(origin);
    }
  }
  return listedOrigins(exact, wildcards);
};

const compileHeaders = (
  configured: readonly string[],
): { allowAllHeaders: boolean; allowedHeaders: readonly string[] } => {
  if (configured.length === 0) {
    return { allowAllHeaders: false, allowedHeaders: DEFAULT_ALLOWED_HEADERS };
  }
  if (configured.includes("*")) {
    return { allowAllHeaders: true, allowedHeaders: [] };
  }
  return {
    allowAllHeaders: false,
    allowedHeaders: convert([...configured, "Origin"], canonicalHeaderKey),
  };
};

/**
 * Compile raw options into a frozen policy. Total: any input, however
 * contradictory, yields a usable policy.
 */
export const compilePolicy = (options: CorsOptions = {}): CorsPolicy => {
  const origins = compileOrigins(options);
  const methods = options.allowedMethods ?? [];
  const { allowAllHeaders, allowedHeaders } = compileHeaders(options.allowedHeaders ?? []);

  return Object.freeze({
    origins,
    allowAllOrigins: origins === anyOrigin,
    allowedMethods: Object.freeze(
      methods.length === 0 ? DEFAULT_ALLOWED_METHODS : convert(methods, (m) => m.toUpperCase()),
    ),
    allowAllHeaders,
    allowedHeaders: Object.freeze(allowedHeaders),
    exposedHeaders: Object.freeze(convert(options.exposedHeaders ?? [], canonicalHeaderKey)),
    allowCredentials: options.allowCredentials ?? false,
    maxAge: options.maxAge ?? 0,
    optionsPassthrough: options.optionsPassthrough ?? false,
  });
};

// ── Admissibility checks ────────────────────────────────────────────────

export const isOriginAllowed = (policy: CorsPolicy, origin: string): boolean =>
  policy.origins.admits(origin);

/** OPTIONS is always allowed; an empty method list allows nothing else. */
export const isMethodAllowed = (policy: CorsPolicy, method: string): boolean => {
  const m = method.toUpperCase();
  if (m === "OPTIONS") return true;
  if (policy.allowedMethods.length === 0) return false;
  return policy.allowedMethods.includes(m);
};

/** All-or-nothing: one unknown header rejects the whole set. */
export const areHeadersAllowed = (policy: CorsPolicy, requested: readonly string[]): boolean => {
  if (policy.allowAllHeaders || requested.length === 0) return true;
  return requested.every((h) => policy.allowedHeaders.includes(canonicalHeaderKey(h)));
};
