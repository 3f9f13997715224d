import { describe, expect, it } from "vitest";
import {
  DEFAULT_ALLOWED_HEADERS,
  allowAllOptions,
  areHeadersAllowed,
  compilePolicy,
  defaultOptions,
  isMethodAllowed,
  isOriginAllowed,
} from "../../src/application/policy/compile-policy.js";
import { OriginMatcherKind } from "../../src/core/ports/origin-matcher.js";

describe("compilePolicy — defaults", () => {
  const policy = compilePolicy(defaultOptions());

  it("allows every origin", () => {
    expect(policy.allowAllOrigins).toBe(true);
    expect(policy.origins.kind).toBe(OriginMatcherKind.ANY);
    expect(isOriginAllowed(policy, "http://anything.test")).toBe(true);
  });

  it("falls back to the simple methods and headers", () => {
    expect(policy.allowedMethods).toEqual(["GET", "POST", "HEAD"]);
    expect(policy.allowedHeaders).toEqual(["Origin", "Accept", "Content-Type", "X-Requested-With"]);
    expect(policy.allowAllHeaders).toBe(false);
  });

  it("leaves the optional features off", () => {
    expect(policy.exposedHeaders).toEqual([]);
    expect(policy.allowCredentials).toBe(false);
    expect(policy.maxAge).toBe(0);
    expect(policy.optionsPassthrough).toBe(false);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(policy)).toBe(true);
    expect(Object.isFrozen(policy.allowedMethods)).toBe(true);
  });
});

describe("compilePolicy — origins", () => {
  it("lets a predicate override every listed origin, even *", () => {
    const policy = compilePolicy({
      allowedOrigins: ["*", "http://listed.test"],
      allowOriginFunc: (o) => o === "http://chosen.test",
    });
    expect(policy.origins.kind).toBe(OriginMatcherKind.PREDICATE);
    expect(policy.allowAllOrigins).toBe(false);
    expect(isOriginAllowed(policy, "http://chosen.test")).toBe(true);
    expect(isOriginAllowed(policy, "http://listed.test")).toBe(false);
  });

  it("passes the origin to the predicate without lower-casing", () => {
    const seen: string[] = [];
    const policy = compilePolicy({
      allowOriginFunc: (o) => {
        seen.push(o);
        return true;
      },
    });
    isOriginAllowed(policy, "HTTP://Mixed.Test");
    expect(seen).toEqual(["HTTP://Mixed.Test"]);
  });

  it("treats * anywhere in the list as allow-all", () => {
    const policy = compilePolicy({ allowedOrigins: ["http://a.test", "*", "http://b.test"] });
    expect(policy.allowAllOrigins).toBe(true);
    expect(isOriginAllowed(policy, "http://zzz.test")).toBe(true);
  });

  it("matches exact origins case-insensitively", () => {
    const policy = compilePolicy({ allowedOrigins: ["HTTP://Foo.Test"] });
    expect(policy.origins.kind).toBe(OriginMatcherKind.LISTED);
    expect(isOriginAllowed(policy, "http://foo.test")).toBe(true);
    expect(isOriginAllowed(policy, "http://FOO.test")).toBe(true);
    expect(isOriginAllowed(policy, "http://foo.test.evil")).toBe(false);
  });

  it("compiles wildcard entries", () => {
    const policy = compilePolicy({ allowedOrigins: ["http://*.bar.com", "http://exact.test"] });
    expect(isOriginAllowed(policy, "http://foo.bar.com")).toBe(true);
    expect(isOriginAllowed(policy, "http://Foo.BAR.com")).toBe(true);
    expect(isOriginAllowed(policy, "http://foo.baz.com")).toBe(false);
    expect(isOriginAllowed(policy, "http://exact.test")).toBe(true);
  });

  it("splits multi-star origins at the first star only", () => {
    const policy = compilePolicy({ allowedOrigins: ["http://*.a.*.test"] });
    expect(isOriginAllowed(policy, "http://x.a.*.test")).toBe(true);
    expect(isOriginAllowed(policy, "http://x.a.b.test")).toBe(false);
  });
});

describe("compilePolicy — methods and headers", () => {
  it("upper-cases methods without adding OPTIONS", () => {
    const policy = compilePolicy({ allowedMethods: ["get", "Patch"] });
    expect(policy.allowedMethods).toEqual(["GET", "PATCH"]);
  });

  it("canonicalizes headers and adds Origin", () => {
    const policy = compilePolicy({ allowedHeaders: ["x-custom", "AUTHORIZATION"] });
    expect(policy.allowedHeaders).toEqual(["X-Custom", "Authorization", "Origin"]);
    expect(policy.allowAllHeaders).toBe(false);
  });

  it("switches to allow-all headers on *", () => {
    const policy = compilePolicy({ allowedHeaders: ["x-custom", "*"] });
    expect(policy.allowAllHeaders).toBe(true);
    expect(policy.allowedHeaders).toEqual([]);
  });

  it("canonicalizes exposed headers", () => {
    const policy = compilePolicy({ exposedHeaders: ["x-header-1", "X-HEADER-2"] });
    expect(policy.exposedHeaders).toEqual(["X-Header-1", "X-Header-2"]);
  });

  it("copies credentials, max-age and passthrough", () => {
    const policy = compilePolicy({ allowCredentials: true, maxAge: 600, optionsPassthrough: true });
    expect(policy.allowCredentials).toBe(true);
    expect(policy.maxAge).toBe(600);
    expect(policy.optionsPassthrough).toBe(true);
  });
});

describe("allowAllOptions", () => {
  it("allows any origin and header with credentials", () => {
    const policy = compilePolicy(allowAllOptions());
    expect(policy.allowAllOrigins).toBe(true);
    expect(policy.allowAllHeaders).toBe(true);
    expect(policy.allowCredentials).toBe(true);
    expect(policy.allowedMethods).toEqual(["HEAD", "GET", "POST", "PUT", "PATCH", "DELETE"]);
  });
});

describe("isMethodAllowed", () => {
  it("compares case-insensitively", () => {
    const policy = compilePolicy();
    expect(isMethodAllowed(policy, "get")).toBe(true);
    expect(isMethodAllowed(policy, "DELETE")).toBe(false);
  });

  it("always allows OPTIONS", () => {
    const policy = compilePolicy({ allowedMethods: ["PUT"] });
    expect(isMethodAllowed(policy, "OPTIONS")).toBe(true);
    expect(isMethodAllowed(policy, "options")).toBe(true);
  });

  it("allows nothing but OPTIONS when the list is empty", () => {
    const policy = { ...compilePolicy(), allowedMethods: [] };
    expect(isMethodAllowed(policy, "GET")).toBe(false);
    expect(isMethodAllowed(policy, "POST")).toBe(false);
    expect(isMethodAllowed(policy, "OPTIONS")).toBe(true);
  });
});

describe("areHeadersAllowed", () => {
  const policy = compilePolicy({ allowedHeaders: ["X-Header-1"] });

  it("accepts an empty request", () => {
    expect(areHeadersAllowed(policy, [])).toBe(true);
  });

  it("canonicalizes before comparing", () => {
    expect(areHeadersAllowed(policy, ["x-header-1", "origin"])).toBe(true);
  });

  it("rejects the whole set when one header is unknown", () => {
    expect(areHeadersAllowed(policy, ["X-Header-1", "X-Header-3"])).toBe(false);
  });

  it("accepts anything under allow-all", () => {
    const all = compilePolicy({ allowedHeaders: ["*"] });
    expect(areHeadersAllowed(all, ["X-Anything", "X-Else"])).toBe(true);
  });

  it("uses the default list when none is configured", () => {
    const defaults = compilePolicy();
    expect(defaults.allowedHeaders).toEqual(DEFAULT_ALLOWED_HEADERS);
    expect(areHeadersAllowed(defaults, ["Content-Type", "Accept"])).toBe(true);
    expect(areHeadersAllowed(defaults, ["Authorization"])).toBe(false);
  });
});
