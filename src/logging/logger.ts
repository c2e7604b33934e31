/**
 * Pino logger factory.
 *
 * JSON lines on stdout unless a destination is given. Level defaults to
 * FIXTURE_LOG_LEVEL.
 */

import { pino, type DestinationStream, type Logger, type LoggerOptions } from "pino";
import { loadConfig, type LogLevel } from "../config.js";

export type { Logger };

export interface LoggerConfig {
  level?: LogLevel;
  /** Base bindings included in every line */
  base?: Record<string, unknown>;
  /** Custom destination, mainly for capturing output in tests */
  destination?: DestinationStream;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? loadConfig().logLevel,
    base: { service: "jsonapi-fixtures", ...config.base },
  };
  return config.destination ? pino(options, config.destination) : pino(options);
}

let defaultLogger: Logger | undefined;

export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger();
  return defaultLogger;
}
