import { z } from "zod";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface FixtureConfig {
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: FixtureConfig = {
  logLevel: "warn",
};

const logLevelSchema = z.enum(LOG_LEVELS);

/** Read settings from the environment. Unknown values fall back to the defaults. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): FixtureConfig {
  const level = logLevelSchema.safeParse(env.FIXTURE_LOG_LEVEL?.toLowerCase());
  return {
    logLevel: level.success ? level.data : DEFAULT_CONFIG.logLevel,
  };
}
