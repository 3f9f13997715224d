import { createServer as createHttpServer, type Server } from "node:http";
import { internal, notFound } from "../core/errors/app-error.js";
import type { IncomingRequest, RequestHandler } from "../core/ports/http.js";
import type { Logger } from "../core/ports/logger.js";
import type { AppConfig } from "../infrastructure/config/config.js";
import { formatAccessLog } from "../shared/log-format.js";
import { generateId } from "../shared/utils/id.js";
import { type BodyResponse, sendError, sendJson } from "./handlers/response.js";
import type { Cors } from "./middleware/cors.js";

export interface AppRequest extends IncomingRequest {
  readonly url?: string | undefined;
}

export interface AppResponse extends BodyResponse {
  once(event: "finish", listener: () => void): unknown;
}

interface ServerDeps {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly cors: Cors;
}

const firstHeader = (req: AppRequest, name: string): string => {
  const value = req.headers[name];
  if (value === undefined) return "";
  return typeof value === "string" ? value : (value[0] ?? "");
};

const extractPath = (url: string | undefined): string => {
  if (!url) return "/";
  const q = url.indexOf("?");
  return q === -1 ? url : url.substring(0, q);
};

/**
 * Demo application: a health route behind the CORS handler.
 * Route errors are the application's own; CORS never sees them.
 */
export const createApp = (deps: ServerDeps): RequestHandler<AppRequest, AppResponse> => {
  const { config, logger, cors } = deps;
  const shouldLog = config.log.level !== "fatal";

  const routes: RequestHandler<AppRequest, AppResponse> = (req, res) => {
    const requestId = firstHeader(req, "x-request-id") || generateId();
    const path = extractPath(req.url);
    res.setHeader("X-Request-Id", requestId);

    try {
      if (path === "/health" && (req.method === "GET" || req.method === "HEAD")) {
        sendJson(res, { status: "ok", uptime: process.uptime() });
        return;
      }
      sendError(res, notFound(`Route ${req.method ?? ""} ${path}`), requestId);
    } catch (e: unknown) {
      logger.error("Unhandled error", {
        requestId,
        error: e instanceof Error ? e.message : String(e),
      });
      sendError(res, internal(), requestId);
    }
  };

  const corsRoutes = cors.handler(routes);

  return (req, res) => {
    if (shouldLog) {
      const start = performance.now();
      res.once("finish", () => {
        const ms = Math.round((performance.now() - start) * 100) / 100;
        process.stdout.write(
          formatAccessLog(
            req.method ?? "",
            extractPath(req.url),
            res.statusCode,
            ms,
            firstHeader(req, "origin"),
            firstHeader(req, "x-request-id") || "-",
          ),
        );
      });
    }
    corsRoutes(req, res);
  };
};

export const createServer = (deps: ServerDeps): Server => createHttpServer(createApp(deps));
