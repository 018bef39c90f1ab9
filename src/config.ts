import { z } from "zod";
import type { LoggerConfig } from "./utils/logger.js";
import { ConfigurationError } from "./utils/errors.js";

const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;

const envSchema = z.object({
  LOG_FILE: z.string().min(1).optional(),
  LOG_LEVEL: z
    .string()
    .transform((level) => level.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .default("warn"),
  NODE_ENV: z.string().optional(),
});

/**
 * Logger settings from the environment:
 * LOG_FILE (rotate into files instead of stderr), LOG_LEVEL (default warn),
 * NODE_ENV=development (extra colorized console output).
 */
export function loadLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid environment variable ${issue.path.join(".")}: ${issue.message}`);
  }

  return {
    logFile: parsed.data.LOG_FILE,
    logLevel: parsed.data.LOG_LEVEL,
    enableConsole: parsed.data.NODE_ENV === "development",
  };
}
