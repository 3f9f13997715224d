/**
 * corsgate — CORS policy engine and Node `http` adapters.
 */
export {
  type Cors,
  createCors,
  defaultCors,
  allowAllCors,
  requestView,
  headerSink,
} from "./presentation/middleware/cors.js";
export {
  compilePolicy,
  defaultOptions,
  allowAllOptions,
  isOriginAllowed,
  isMethodAllowed,
  areHeadersAllowed,
  DEFAULT_ALLOWED_HEADERS,
  DEFAULT_ALLOWED_METHODS,
} from "./application/policy/compile-policy.js";
export {
  type CorsService,
  type Abort,
  type Check,
  type Verdict,
  type NegotiationState,
  createCorsService,
  isPreflight,
  runChecks,
  PREFLIGHT_CHECKS,
  ACTUAL_CHECKS,
} from "./application/services/cors.service.js";
export { type CorsOptions, type CorsPolicy, CorsHeader } from "./core/entities/cors-policy.entity.js";
export type {
  HeaderSink,
  IncomingRequest,
  NextFunction,
  OutgoingResponse,
  RequestHandler,
  RequestView,
} from "./core/ports/http.js";
export type { Logger, LogLevel, LogMeta } from "./core/ports/logger.js";
export { type OriginMatcher, OriginMatcherKind } from "./core/ports/origin-matcher.js";
export { createLogger, createNoopLogger } from "./infrastructure/logging/logger.js";
export { canonicalHeaderKey, convert, parseHeaderList } from "./shared/utils/header-list.js";
export { type Wildcard, matchWildcard, wildcardFromPattern } from "./shared/utils/wildcard.js";
