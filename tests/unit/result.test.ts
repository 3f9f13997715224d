import { describe, expect, it } from "vitest";
import { type Result, err, flatMap, ok } from "../../src/core/types/result.js";

describe("Result", () => {
  it("ok wraps a value", () => {
    const r = ok(42);
    expect(r.ok).toBe(true);
    expect(r.value).toBe(42);
  });

  it("err wraps an error", () => {
    const r = err("fail");
    expect(r.ok).toBe(false);
    expect(r.error).toBe("fail");
  });

  it("flatMap stops at the first err", () => {
    const calls: string[] = [];
    const step =
      (name: string, pass: boolean) =>
      (n: number): Result<number, string> => {
        calls.push(name);
        return pass ? ok(n + 1) : err(name);
      };

    const r = flatMap(flatMap(flatMap(ok(0), step("a", true)), step("b", false)), step("c", true));
    expect(r).toEqual(err("b"));
    expect(calls).toEqual(["a", "b"]);
  });
});
