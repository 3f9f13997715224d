import { type AppError, httpStatus } from "../../core/errors/app-error.js";
import type { OutgoingResponse } from "../../core/ports/http.js";

/** A response that can also carry a body. */
export interface BodyResponse extends OutgoingResponse {
  end(body?: string): unknown;
}

/** Success response helper */
export const sendJson = <T>(res: BodyResponse, data: T, status = 200): void => {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify({ data }));
};

/**
 * Serialise an AppError into a JSON response. Never leaks internals.
 */
export const sendError = (res: BodyResponse, error: AppError, requestId: string): void => {
  const body: Record<string, unknown> = {
    error: {
      code: error.code,
      message: error.message,
      ...(error.details ? { details: error.details } : {}),
    },
    requestId,
  };

  res.statusCode = httpStatus(error.code);
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(body));
};
