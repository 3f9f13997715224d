import {
  type CorsService,
  createCorsService,
  isPreflight,
} from "../../application/services/cors.service.js";
import {
  allowAllOptions,
  compilePolicy,
  defaultOptions,
} from "../../application/policy/compile-policy.js";
import type { CorsOptions, CorsPolicy } from "../../core/entities/cors-policy.entity.js";
import type {
  HeaderSink,
  IncomingRequest,
  NextFunction,
  OutgoingResponse,
  RequestHandler,
  RequestView,
} from "../../core/ports/http.js";
import type { Logger } from "../../core/ports/logger.js";
import { createLogger } from "../../infrastructure/logging/logger.js";

/**
 * CORS for Node `http`-shaped handlers.
 *
 * The three entry points share one routing rule and one negotiation service,
 * so identical requests always get identical headers:
 *
 * - `handler(next)` wraps a request listener.
 * - `handle(req, res)` only writes headers; the caller decides what follows.
 * - `middleware(req, res, next)` plugs into Connect / Express.
 *
 * A preflight without `optionsPassthrough` is answered here with an empty 200.
 */
export interface Cors {
  readonly policy: CorsPolicy;
  handler<Req extends IncomingRequest, Res extends OutgoingResponse>(
    next: RequestHandler<Req, Res>,
  ): RequestHandler<Req, Res>;
  handle(req: IncomingRequest, res: OutgoingResponse): void;
  middleware(req: IncomingRequest, res: OutgoingResponse, next: NextFunction): void;
}

/** First value of a header; "" when absent. Node lower-cases incoming names. */
export const requestView = (req: IncomingRequest): RequestView => ({
  method: req.method ?? "",
  header: (name) => {
    const value = req.headers[name.toLowerCase()];
    if (value === undefined) return "";
    if (typeof value === "string") return value;
    return value[0] ?? "";
  },
});

export const headerSink = (res: OutgoingResponse): HeaderSink => ({
  set: (name, value) => {
    res.setHeader(name, value);
  },
  append: (name, value) => {
    res.appendHeader(name, value);
  },
});

const resolveLogger = (options: CorsOptions): Logger | undefined => {
  if (!options.debug) return undefined;
  return options.logger ?? createLogger("debug", { component: "cors" });
};

export const createCors = (options: CorsOptions = {}): Cors => {
  const logger = resolveLogger(options);
  const service: CorsService = createCorsService({ policy: compilePolicy(options), logger });
  const { policy } = service;

  /** Negotiate; returns true when the response was a preflight. */
  const negotiate = (entry: string, req: IncomingRequest, res: OutgoingResponse): boolean => {
    const view = requestView(req);
    const sink = headerSink(res);
    if (isPreflight(view)) {
      logger?.debug(`${entry}: Preflight request`);
      service.handlePreflight(view, sink);
      return true;
    }
    logger?.debug(`${entry}: Actual request`);
    service.handleActualRequest(view, sink);
    return false;
  };

  const finishPreflight = (res: OutgoingResponse): void => {
    res.statusCode = 200;
    res.end();
  };

  return {
    policy,

    handler<Req extends IncomingRequest, Res extends OutgoingResponse>(
      next: RequestHandler<Req, Res>,
    ): RequestHandler<Req, Res> {
      return (req: Req, res: Res) => {
        if (negotiate("Handler", req, res) && !policy.optionsPassthrough) {
          finishPreflight(res);
          return;
        }
        next(req, res);
      };
    },

    handle(req, res) {
      negotiate("Handle", req, res);
    },

    middleware(req, res, next) {
      if (negotiate("Middleware", req, res) && !policy.optionsPassthrough) {
        finishPreflight(res);
        return;
      }
      next();
    },
  };
};

/** CORS with every option at its default. */
export const defaultCors = (logger?: Logger): Cors =>
  createCors(logger ? { ...defaultOptions(), debug: true, logger } : defaultOptions());

/** Any origin, common methods, any header, credentials allowed. */
export const allowAllCors = (logger?: Logger): Cors =>
  createCors(logger ? { ...allowAllOptions(), debug: true, logger } : allowAllOptions());
