import { z } from "zod";
import type { CorsOptions } from "../../core/entities/cors-policy.entity.js";
import { type AppError, validation } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { printConfigError } from "../../shared/cli.js";

/** Comma-separated env list; blank or missing becomes []. */
const csv = z
  .string()
  .optional()
  .transform((s) =>
    (s ?? "")
      .split(",")
      .map((v) => v.trim())
      .filter((v) => v !== ""),
  );

const flag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

/**
 * Application config — validated at boot via Zod.
 * Only the demo server reads it; library users pass CorsOptions directly.
 */
const configSchema = z.object({
  env: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  host: z.string().min(1).default("0.0.0.0"),

  log: z.object({
    level: z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
    format: z.enum(["pretty", "json"]).default("pretty"),
  }),

  cors: z.object({
    allowedOrigins: csv,
    allowedMethods: csv,
    allowedHeaders: csv,
    exposedHeaders: csv,
    maxAge: z.coerce.number().int().min(0).default(0),
    allowCredentials: flag,
    optionsPassthrough: flag,
    debug: flag,
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

type Env = Readonly<Record<string, string | undefined>>;

/** Blank env values count as unset so defaults apply. */
const read = (env: Env, key: string): string | undefined => {
  const value = env[key];
  return value === undefined || value.trim() === "" ? undefined : value;
};

export const parseConfig = (env: Env): Result<AppConfig, AppError> => {
  const result = configSchema.safeParse({
    env: read(env, "NODE_ENV"),
    port: read(env, "PORT"),
    host: read(env, "HOST"),
    log: {
      level: read(env, "LOG_LEVEL"),
      format: read(env, "LOG_FORMAT"),
    },
    cors: {
      allowedOrigins: read(env, "CORS_ALLOWED_ORIGINS"),
      allowedMethods: read(env, "CORS_ALLOWED_METHODS"),
      allowedHeaders: read(env, "CORS_ALLOWED_HEADERS"),
      exposedHeaders: read(env, "CORS_EXPOSED_HEADERS"),
      maxAge: read(env, "CORS_MAX_AGE"),
      allowCredentials: read(env, "CORS_ALLOW_CREDENTIALS"),
      optionsPassthrough: read(env, "CORS_OPTIONS_PASSTHROUGH"),
      debug: read(env, "CORS_DEBUG"),
    },
  });

  if (!result.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const field = issue.path.join(".") || "(root)";
      fieldErrors[field] = [...(fieldErrors[field] ?? []), issue.message];
    }
    return err(validation(fieldErrors));
  }

  return ok(result.data);
};

/** Reads process.env; prints the problems and exits on invalid config. */
export const loadConfig = (): AppConfig => {
  const result = parseConfig(process.env);
  if (!result.ok) {
    printConfigError(result.error.details ?? {});
    process.exit(1);
  }
  return result.value;
};

export const toCorsOptions = (config: AppConfig): CorsOptions => ({
  allowedOrigins: config.cors.allowedOrigins,
  allowedMethods: config.cors.allowedMethods,
  allowedHeaders: config.cors.allowedHeaders,
  exposedHeaders: config.cors.exposedHeaders,
  maxAge: config.cors.maxAge,
  allowCredentials: config.cors.allowCredentials,
  optionsPassthrough: config.cors.optionsPassthrough,
  debug: config.cors.debug,
});
