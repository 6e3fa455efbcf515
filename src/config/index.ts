/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvInt, optionalEnvBool } from "./env.js";
import type { MartConnectionOverrides } from "./connection/index.js";

export { ConfigError } from "./env.js";
export * from "./connection/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Write log lines to the console */
  readonly logConsole: boolean;
  /** Append log lines to this file, when set */
  readonly logFile: string | undefined;
  /** Connection settings taken from MART_* variables; unset keys use the defaults */
  readonly connection: Readonly<MartConnectionOverrides>;
}

function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logConsole: optionalEnvBool("LOG_CONSOLE", true),
    logFile: optionalEnv("LOG_FILE"),
    connection: {
      host: optionalEnv("MART_HOST"),
      path: optionalEnv("MART_PATH"),
      port: optionalEnvInt("MART_PORT"),
      virtualSchema: optionalEnv("MART_VIRTUAL_SCHEMA"),
      timeoutMs: optionalEnvInt("MART_TIMEOUT_MS"),
    },
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate the environment-derived settings.
 * Call this at startup to fail fast.
 */
export function validateConfig(settings: AppConfig = config): void {
  if (!["development", "production", "test"].includes(settings.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${settings.env}. Must be development, production, or test.`
    );
  }

  if (!["debug", "info", "warn", "error"].includes(settings.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${settings.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}
