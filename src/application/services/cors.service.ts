import { CorsHeader, type CorsPolicy } from "../../core/entities/cors-policy.entity.js";
import type { HeaderSink, RequestView } from "../../core/ports/http.js";
import type { LogMeta, Logger } from "../../core/ports/logger.js";
import { type Result, err, flatMap, ok } from "../../core/types/result.js";
import { parseHeaderList } from "../../shared/utils/header-list.js";
import { areHeadersAllowed, isMethodAllowed, isOriginAllowed } from "../policy/compile-policy.js";

/** Why a chain stopped. Never surfaced to the client, only logged. */
export interface Abort {
  readonly reason: string;
  readonly meta?: LogMeta;
}

/** Everything the checks read, captured once per request. */
export interface NegotiationState {
  readonly method: string;
  readonly origin: string;
  /** Preflight only: the upper-cased `Access-Control-Request-Method`. */
  readonly requestMethod: string;
  /** Preflight only: parsed `Access-Control-Request-Headers`. */
  readonly requestHeaders: readonly string[];
}

export type Verdict = Result<NegotiationState, Abort>;
export type Check = (policy: CorsPolicy, state: NegotiationState) => Verdict;

const abort = (reason: string, meta?: LogMeta): Verdict =>
  err(meta === undefined ? { reason } : { reason, meta });

// ── Checks ──────────────────────────────────────────────────────────────

const methodIsOptions: Check = (_policy, s) =>
  s.method === "OPTIONS" ? ok(s) : abort(`${s.method}!=OPTIONS`, { method: s.method });

const methodIsNotOptions: Check = (_policy, s) =>
  s.method !== "OPTIONS" ? ok(s) : abort(`method == ${s.method}`, { method: s.method });

const originPresent: Check = (_policy, s) => (s.origin !== "" ? ok(s) : abort("missing origin"));

const originAllowed: Check = (policy, s) =>
  isOriginAllowed(policy, s.origin) ? ok(s) : abort("origin not allowed", { origin: s.origin });

const requestMethodAllowed: Check = (policy, s) =>
  isMethodAllowed(policy, s.requestMethod)
    ? ok(s)
    : abort("method not allowed", { method: s.requestMethod });

const actualMethodAllowed: Check = (policy, s) =>
  isMethodAllowed(policy, s.method) ? ok(s) : abort("method not allowed", { method: s.method });

const requestHeadersAllowed: Check = (policy, s) =>
  areHeadersAllowed(policy, s.requestHeaders)
    ? ok(s)
    : abort("headers not allowed", { headers: s.requestHeaders.join(", ") });

/** Preflight order; the first failing check wins. */
export const PREFLIGHT_CHECKS: readonly Check[] = Object.freeze([
  methodIsOptions,
  originPresent,
  originAllowed,
  requestMethodAllowed,
  requestHeadersAllowed,
]);

/** Actual-request order, after the OPTIONS short-circuit and `Vary: Origin`. */
export const ACTUAL_CHECKS: readonly Check[] = Object.freeze([
  originPresent,
  originAllowed,
  actualMethodAllowed,
]);

export const runChecks = (
  checks: readonly Check[],
  policy: CorsPolicy,
  state: NegotiationState,
): Verdict => checks.reduce<Verdict>((acc, check) => flatMap(acc, (s) => check(policy, s)), ok(state));

export const readState = (req: RequestView): NegotiationState => ({
  method: req.method,
  origin: req.header(CorsHeader.ORIGIN),
  requestMethod: req.header(CorsHeader.REQUEST_METHOD).toUpperCase(),
  requestHeaders: parseHeaderList(req.header(CorsHeader.REQUEST_HEADERS)),
});

/** OPTIONS carrying a non-empty `Access-Control-Request-Method`. */
export const isPreflight = (req: RequestView): boolean =>
  req.method === "OPTIONS" && req.header(CorsHeader.REQUEST_METHOD) !== "";

// ── Service ─────────────────────────────────────────────────────────────

export interface CorsService {
  readonly policy: CorsPolicy;
  handlePreflight(req: RequestView, headers: HeaderSink): void;
  handleActualRequest(req: RequestView, headers: HeaderSink): void;
}

interface Deps {
  readonly policy: CorsPolicy;
  /** Receives decision traces; silent when absent. */
  readonly logger?: Logger | undefined;
}

export const createCorsService = (deps: Deps): CorsService => {
  const { policy, logger } = deps;

  const allowOriginValue = (origin: string): string =>
    policy.allowAllOrigins && !policy.allowCredentials ? "*" : origin;

  const apply = (headers: HeaderSink, values: Record<string, string>): void => {
    for (const [name, value] of Object.entries(values)) headers.set(name, value);
  };

  return {
    policy,

    handlePreflight(req, headers) {
      headers.append(CorsHeader.VARY, CorsHeader.ORIGIN);
      headers.append(CorsHeader.VARY, CorsHeader.REQUEST_METHOD);
      headers.append(CorsHeader.VARY, CorsHeader.REQUEST_HEADERS);

      const verdict = runChecks(PREFLIGHT_CHECKS, policy, readState(req));
      if (!verdict.ok) {
        logger?.debug(`Preflight aborted: ${verdict.error.reason}`, verdict.error.meta);
        return;
      }

      const s = verdict.value;
      const out: Record<string, string> = {
        [CorsHeader.ALLOW_ORIGIN]: allowOriginValue(s.origin),
        [CorsHeader.ALLOW_METHODS]: s.requestMethod,
      };
      if (s.requestHeaders.length > 0) {
        out[CorsHeader.ALLOW_HEADERS] = s.requestHeaders.join(", ");
      }
      if (policy.allowCredentials) out[CorsHeader.ALLOW_CREDENTIALS] = "true";
      if (policy.maxAge > 0) out[CorsHeader.MAX_AGE] = String(policy.maxAge);

      apply(headers, out);
      logger?.debug("Preflight response headers", out);
    },

    handleActualRequest(req, headers) {
      const state = readState(req);
      const options = methodIsNotOptions(policy, state);
      if (!options.ok) {
        logger?.debug(`Actual request no headers added: ${options.error.reason}`);
        return;
      }

      headers.append(CorsHeader.VARY, CorsHeader.ORIGIN);

      const verdict = runChecks(ACTUAL_CHECKS, policy, state);
      if (!verdict.ok) {
        logger?.debug(
          `Actual request no headers added: ${verdict.error.reason}`,
          verdict.error.meta,
        );
        return;
      }

      const out: Record<string, string> = {
        [CorsHeader.ALLOW_ORIGIN]: allowOriginValue(verdict.value.origin),
      };
      if (policy.exposedHeaders.length > 0) {
        out[CorsHeader.EXPOSE_HEADERS] = policy.exposedHeaders.join(", ");
      }
      if (policy.allowCredentials) out[CorsHeader.ALLOW_CREDENTIALS] = "true";

      apply(headers, out);
      logger?.debug("Actual response added headers", out);
    },
  };
};
