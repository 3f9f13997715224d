import { describe, expect, it } from "vitest";
import {
  ErrorCode,
  appError,
  httpStatus,
  internal,
  notFound,
  validation,
} from "../../src/core/errors/app-error.js";

describe("AppError", () => {
  it("notFound → 404", () => {
    const e = notFound("Route GET /x");
    expect(e.message).toBe("Route GET /x not found");
    expect(httpStatus(e.code)).toBe(404);
  });

  it("validation → 422 with details", () => {
    const e = validation({ port: ["Expected number"] });
    expect(e.code).toBe(ErrorCode.VALIDATION);
    expect(httpStatus(e.code)).toBe(422);
    expect(e.details).toEqual({ port: ["Expected number"] });
  });

  it("internal → 500 keeps the cause", () => {
    const cause = new Error("db down");
    const e = internal("Boom", cause);
    expect(httpStatus(e.code)).toBe(500);
    expect(e.cause).toBe(cause);
    expect(e.details).toBeUndefined();
  });

  it("appError omits absent fields", () => {
    expect(appError(ErrorCode.INTERNAL, "x")).toEqual({ code: "INTERNAL", message: "x" });
  });
});
