/**
 * Environment variable access.
 *
 * Values come from the process environment, with a `.env` file in the
 * working directory loaded first when one exists.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function readEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Get an optional environment variable, or undefined when unset.
 */
export function optionalEnv(key: string): string | undefined;
export function optionalEnv(key: string, defaultValue: string): string;
export function optionalEnv(key: string, defaultValue?: string): string | undefined {
  return readEnv(key) ?? defaultValue;
}

/**
 * Get an optional environment variable as an integer.
 */
export function optionalEnvInt(key: string): number | undefined;
export function optionalEnvInt(key: string, defaultValue: number): number;
export function optionalEnvInt(key: string, defaultValue?: number): number | undefined {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigError(
      `Environment variable ${key} must be a valid integer, got: ${value}`
    );
  }
  return parseInt(value, 10);
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}
