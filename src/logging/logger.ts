import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

// The Hardcover key, and the bearer header built from it.
const SECRET_PATHS = ["*.apiKey", "*.authorization", "req.headers.authorization"];

/** JSON logger with ISO timestamps; pretty-printed through pino-pretty when configured. */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { err: pino.stdSerializers.err },
    base: { service: "shelfwise", version: process.env["APP_VERSION"] ?? "dev" },
    ...(config.redactSecrets ? { redact: { paths: SECRET_PATHS, censor: "[REDACTED]" } } : {}),
  };

  if (destination) return pino(options, destination);
  if (!config.prettyPrint) return pino(options);

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
    },
  });
}
