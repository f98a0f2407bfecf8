// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import { z } from "zod";
import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

const booleanFlag = z
  .enum(["true", "false"])
  .default("true")
  .transform((value) => value === "true");

const EnvSchema = z.object({
  DASHBOARD_ENV: z.enum(["development", "staging", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  DASHBOARD_PROFILE: z.string().min(1).default("classic"),
  DATASET_PATH: z.string().min(1).default("inscriptions_data.csv"),
  DATASET_FALLBACK: z.enum(["sample", "empty"]).default("sample"),
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  CACHE_ENABLED: booleanFlag,
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(8),
  CACHE_TTL_S: z.coerce.number().int().positive().default(600),
});

/**
 * Load the application configuration from environment variables.
 *
 * Every setting has a hard-coded default so the dashboard starts with zero
 * configuration against `inscriptions_data.csv` in the working directory.
 *
 * @throws {ConfigurationError} when a variable is set to an invalid value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment configuration: ${problems}`);
  }

  const vars = parsed.data;

  return {
    env: vars.DASHBOARD_ENV,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    profile: vars.DASHBOARD_PROFILE,

    dataset: {
      path: vars.DATASET_PATH,
      fallback: vars.DATASET_FALLBACK,
      uploadMaxBytes: vars.UPLOAD_MAX_BYTES,
    },

    cache: {
      enabled: vars.CACHE_ENABLED,
      maxMemoryEntries: vars.CACHE_MAX_ENTRIES,
      datasetTtlSeconds: vars.CACHE_TTL_S,
    },
  };
}
