import { networkInterfaces } from "node:os";
import type { CorsPolicy } from "../core/entities/cors-policy.entity.js";
import type { AppConfig } from "../infrastructure/config/config.js";

// ── ANSI escape sequences (zero dependencies) ──────────────────────────

const esc = (code: string) => `\x1b[${code}m`;
const reset = esc("0");

const bold = (s: string) => `${esc("1")}${s}${reset}`;
const dim = (s: string) => `${esc("2")}${s}${reset}`;

const cyan = (s: string) => `${esc("36")}${s}${reset}`;
const green = (s: string) => `${esc("32")}${s}${reset}`;
const yellow = (s: string) => `${esc("33")}${s}${reset}`;
const magenta = (s: string) => `${esc("35")}${s}${reset}`;
const red = (s: string) => `${esc("31")}${s}${reset}`;
const gray = (s: string) => `${esc("90")}${s}${reset}`;
const white = (s: string) => `${esc("97")}${s}${reset}`;

const bgCyan = (s: string) => `${esc("46")}${esc("30")} ${s} ${reset}`;
const bgGreen = (s: string) => `${esc("42")}${esc("30")} ${s} ${reset}`;
const bgYellow = (s: string) => `${esc("43")}${esc("30")} ${s} ${reset}`;
const bgMagenta = (s: string) => `${esc("45")}${esc("97")} ${s} ${reset}`;

// ── Helpers ─────────────────────────────────────────────────────────────

const formatUptime = (ms: number): string => {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
};

const envBadge = (env: string): string => {
  switch (env) {
    case "production":
      return bgGreen("PRODUCTION");
    case "development":
      return bgCyan("DEVELOPMENT");
    case "test":
      return bgYellow("TEST");
    default:
      return bgMagenta(env.toUpperCase());
  }
};

const onOff = (v: boolean): string => (v ? green("on") : gray("off"));

const list = (items: readonly string[], fallback: string): string =>
  items.length === 0 ? dim(fallback) : white(items.join(", "));

/** One-line description of how origins are admitted. */
export const describeOrigins = (config: AppConfig, policy: CorsPolicy): string => {
  if (policy.allowAllOrigins) return "any";
  return config.cors.allowedOrigins.join(", ");
};

const getLocalIp = (): string => {
  const nets = networkInterfaces();
  for (const entries of Object.values(nets)) {
    for (const net of entries ?? []) {
      if (net.family === "IPv4" && !net.internal) return net.address;
    }
  }
  return "0.0.0.0";
};

// ── Public API ──────────────────────────────────────────────────────────

interface StartupInfo {
  readonly config: AppConfig;
  readonly policy: CorsPolicy;
  readonly bootTimeMs: number;
}

/**
 * Startup banner: where the server listens and the effective CORS policy.
 */
export const printStartupBanner = (info: StartupInfo): void => {
  const { config, policy, bootTimeMs } = info;
  const localUrl = `http://localhost:${config.port}`;

  const lines: string[] = [];

  lines.push("");
  lines.push(`  ${bold(white("corsgate"))}  ${dim(gray("CORS gateway demo"))}`);
  lines.push("");
  lines.push(`  ${envBadge(config.env)}  ${dim("booted in")} ${bold(green(formatUptime(bootTimeMs)))}`);
  lines.push("");
  lines.push(`  ${bold(white("→"))} ${dim("Local:")}    ${bold(cyan(localUrl))}`);
  if (config.host === "0.0.0.0") {
    lines.push(`  ${bold(white("→"))} ${dim("Network:")}  ${bold(cyan(`http://${getLocalIp()}:${config.port}`))}`);
  }
  lines.push("");
  lines.push(`  ${gray("├─")} ${dim("PID")}           ${white(String(process.pid))}`);
  lines.push(`  ${gray("├─")} ${dim("Runtime")}       ${magenta(`Node ${process.version}`)}`);
  lines.push(`  ${gray("├─")} ${dim("Origins")}       ${white(describeOrigins(config, policy))}`);
  lines.push(`  ${gray("├─")} ${dim("Methods")}       ${list(policy.allowedMethods, "none")}`);
  lines.push(
    `  ${gray("├─")} ${dim("Headers")}       ${policy.allowAllHeaders ? white("any") : list(policy.allowedHeaders, "none")}`,
  );
  lines.push(`  ${gray("├─")} ${dim("Exposed")}       ${list(policy.exposedHeaders, "none")}`);
  lines.push(`  ${gray("├─")} ${dim("Credentials")}   ${onOff(policy.allowCredentials)}`);
  lines.push(`  ${gray("├─")} ${dim("Max age")}       ${white(policy.maxAge > 0 ? `${policy.maxAge}s` : "-")}`);
  lines.push(`  ${gray("├─")} ${dim("Passthrough")}   ${onOff(policy.optionsPassthrough)}`);
  lines.push(`  ${gray("└─")} ${dim("Log level")}     ${white(config.log.level)}`);
  lines.push("");
  lines.push(`  ${dim("press")} ${bold(white("Ctrl+C"))} ${dim("to stop")}`);
  lines.push("");

  process.stdout.write(`${lines.join("\n")}\n`);
};

/**
 * Prints a clean shutdown message.
 */
export const printShutdown = (signal: string): void => {
  process.stdout.write(
    `\n  ${yellow("⏻")} ${dim("Received")} ${bold(white(signal))}${dim(", shutting down gracefully…")}\n\n`,
  );
};

/**
 * Prints config validation errors, one line per message.
 */
export const printConfigError = (errors: Record<string, unknown>): void => {
  const lines: string[] = [];

  lines.push("");
  lines.push(`  ${bgMagenta("CONFIG ERROR")}  ${dim("Invalid configuration detected")}`);
  lines.push("");

  for (const [field, messages] of Object.entries(errors)) {
    const all = Array.isArray(messages) ? messages : [messages];
    for (const msg of all) {
      lines.push(`  ${red("✗")} ${bold(white(field))} ${dim("→")} ${red(String(msg))}`);
    }
  }

  lines.push("");
  lines.push(`  ${dim("Hint: check the CORS_* and PORT variables in your environment.")}`);
  lines.push("");

  process.stderr.write(`${lines.join("\n")}\n`);
};
