import type { LogLevel, LogMeta, Logger } from "../../core/ports/logger.js";
import { formatJsonEntry, formatLogEntry } from "../../shared/log-format.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export type LogFormat = "pretty" | "json";

/**
 * Console logger — zero dependencies.
 * - "pretty": ANSI-colored lines for a terminal (default)
 * - "json": one JSON object per line for log aggregators
 *
 * Each entry is a single `write` call, so lines from concurrent requests
 * never interleave. warn and above go to stderr.
 */
export const createLogger = (
  minLevel: LogLevel = "info",
  bindings: LogMeta = {},
  format: LogFormat = "pretty",
): Logger => {
  const minPriority = LEVEL_PRIORITY[minLevel];
  const formatter = format === "json" ? formatJsonEntry : formatLogEntry;

  const write = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const line = formatter(level, msg, { ...bindings, ...meta });
    if (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.warn) {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    fatal: (msg, meta) => write("fatal", msg, meta),
    child: (extra) => createLogger(minLevel, { ...bindings, ...extra }, format),
  };
};

/** Logger that drops everything. */
export const createNoopLogger = (): Logger => {
  const noop = (): void => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    child: () => logger,
  };
  return logger;
};
