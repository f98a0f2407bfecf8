// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

/** Re-export pino's Logger type for convenience. */
export type Logger = pino.Logger;

/**
 * Create a configured pino logger instance.
 *
 * - JSON output (pino default) with `service` and `version` base fields
 * - Errors under `err` serialized with pino's standard serializer
 * - Optional pretty-print via `pino-pretty` transport for development
 */
export function createLogger(config: LoggingConfig): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "inscriptions-dashboard",
      version: process.env["APP_VERSION"] ?? "dev",
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(baseOptions);
}
