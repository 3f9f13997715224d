/**
 * Canonical application error. CORS decisions never produce one: a rejected
 * origin is expressed by omitting headers. AppError covers the edges that
 * can genuinely fail: env configuration and the demo server's routes.
 */

export const ErrorCode = {
  NOT_FOUND: "NOT_FOUND",
  VALIDATION: "VALIDATION",
  INTERNAL: "INTERNAL",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

const STATUS_MAP: Record<ErrorCode, number> = {
  NOT_FOUND: 404,
  VALIDATION: 422,
  INTERNAL: 500,
};

export const httpStatus = (code: ErrorCode): number => STATUS_MAP[code];

export const appError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): AppError => {
  const error: AppError = { code, message };
  if (details !== undefined) {
    return cause === undefined ? { ...error, details } : { ...error, details, cause };
  }
  if (cause !== undefined) {
    return { ...error, cause };
  }
  return error;
};

export const notFound = (resource: string): AppError =>
  appError(ErrorCode.NOT_FOUND, `${resource} not found`);

export const validation = (details: Record<string, unknown>): AppError =>
  appError(ErrorCode.VALIDATION, "Validation failed", details);

export const internal = (msg = "Internal server error", cause?: unknown): AppError =>
  appError(ErrorCode.INTERNAL, msg, undefined, cause);
