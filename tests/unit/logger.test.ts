import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLogger, createNoopLogger } from "../../src/infrastructure/logging/logger.js";

const capture = (stream: NodeJS.WriteStream) => {
  const output: string[] = [];
  const originalWrite = stream.write;
  stream.write = (chunk: string | Uint8Array): boolean => {
    output.push(typeof chunk === "string" ? chunk : new TextDecoder().decode(chunk));
    return true;
  };
  return { output, restore: () => void (stream.write = originalWrite) };
};

describe("Logger — JSON format", () => {
  let stdout: ReturnType<typeof capture>;

  beforeEach(() => {
    stdout = capture(process.stdout);
  });

  afterEach(() => {
    stdout.restore();
  });

  it("outputs one JSON line per entry", () => {
    createLogger("info", {}, "json").info("test message", { key: "value" });

    expect(stdout.output.length).toBe(1);
    const parsed = JSON.parse((stdout.output[0] ?? "").trim());
    expect(parsed.level).toBe("info");
    expect(parsed.msg).toBe("test message");
    expect(parsed.key).toBe("value");
    expect(new Date(parsed.time).toISOString()).toBe(parsed.time);
  });

  it("child logger merges bindings", () => {
    const child = createLogger("debug", { component: "cors" }, "json").child({ requestId: "req-1" });
    child.debug("Preflight aborted: missing origin");

    const parsed = JSON.parse((stdout.output[0] ?? "").trim());
    expect(parsed.component).toBe("cors");
    expect(parsed.requestId).toBe("req-1");
    expect(parsed.level).toBe("debug");
  });

  it("drops entries below the minimum level", () => {
    const logger = createLogger("info", {}, "json");
    logger.debug("hidden");
    expect(stdout.output).toEqual([]);
  });
});

describe("Logger — streams and formats", () => {
  it("sends warn and above to stderr", () => {
    const stderr = capture(process.stderr);
    try {
      const logger = createLogger("warn", {}, "json");
      logger.warn("warning message");
      logger.error("error message");
    } finally {
      stderr.restore();
    }

    expect(stderr.output.map((l) => JSON.parse(l.trim()).level)).toEqual(["warn", "error"]);
  });

  it("pretty format writes a single non-JSON line with meta", () => {
    const stdout = capture(process.stdout);
    try {
      createLogger("debug", { component: "cors" }, "pretty").debug("Handler: Actual request");
    } finally {
      stdout.restore();
    }

    expect(stdout.output.length).toBe(1);
    const line = stdout.output[0] ?? "";
    expect(line).toContain("Handler: Actual request");
    expect(line).toContain("component");
    expect(line.endsWith("\n")).toBe(true);
    expect(() => JSON.parse(line.trim())).toThrow();
  });

  it("noop logger writes nothing", () => {
    const stdout = capture(process.stdout);
    try {
      const logger = createNoopLogger();
      logger.info("ignored");
      logger.child({ a: 1 }).debug("ignored");
    } finally {
      stdout.restore();
    }
    expect(stdout.output).toEqual([]);
  });
});
