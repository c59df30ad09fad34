/**
 * @vouch/core - Environment Variables
 * Typed access to process.env
 */

/**
 * Source of environment values. Defaults to process.env, tests pass a plain object.
 */
export type EnvSource = Record<string, string | undefined>;

/**
 * Get an environment variable value
 */
export function getEnv(
  key: string,
  defaultValue?: string,
  source: EnvSource = process.env
): string | undefined {
  const value = source[key];
  return value === undefined || value === "" ? defaultValue : value;
}

/**
 * Get an environment variable as an integer.
 * Throws when the variable is set but is not an integer, so a typo fails at startup.
 */
export function getEnvNumber(
  key: string,
  defaultValue: number,
  source: EnvSource = process.env
): number {
  const value = getEnv(key, undefined, source);
  if (value === undefined) {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new Error(`Environment variable "${key}" must be an integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Environment mode
 */
export type EnvMode = "development" | "production" | "test";

/**
 * Get current environment mode from APP_ENV, falling back to NODE_ENV
 */
export function getEnvMode(source: EnvSource = process.env): EnvMode {
  const env = getEnv("APP_ENV", undefined, source) ?? getEnv("NODE_ENV", undefined, source);
  if (env === "production") return "production";
  if (env === "test") return "test";
  return "development";
}

/**
 * Check if running in development mode
 */
export function isDevelopment(source: EnvSource = process.env): boolean {
  return getEnvMode(source) === "development";
}
