/**
 * @vouch/server - Configuration
 * Everything the entry point reads from the environment, validated up front
 */

import { getEnv, getEnvNumber, ValidationError, type EnvSource } from "@vouch/core";
import { serverConfig, formatErrors, type, type ServerConfigInput } from "@vouch/types";
import { loadAuthConfig, parseDuration, type AuthConfig } from "@vouch/auth";
import { loadDatabaseConfig, type DatabaseConfig } from "@vouch/database";

export interface ServerConfig extends ServerConfigInput {
  /** Sweep period in milliseconds; 0 disables the sweep */
  tokenCleanupIntervalMs: number;
}

export interface AppConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  auth: AuthConfig;
}

const SERVER_ENV_VARS: Record<keyof ServerConfigInput, string> = {
  port: "PORT",
  env: "APP_ENV",
  corsOrigin: "CORS_ORIGIN",
  tokenCleanupInterval: "TOKEN_CLEANUP_INTERVAL",
};

function isServerField(field: string): field is keyof ServerConfigInput {
  return Object.hasOwn(SERVER_ENV_VARS, field);
}

/**
 * Load HTTP server settings.
 * Throws ValidationError naming the offending variables.
 */
export function loadServerConfig(source: EnvSource = process.env): ServerConfig {
  const result = serverConfig({
    port: getEnvNumber("PORT", 3000, source),
    env: getEnv("APP_ENV", "development", source),
    corsOrigin: getEnv("CORS_ORIGIN", "*", source),
    tokenCleanupInterval: getEnv("TOKEN_CLEANUP_INTERVAL", "1h", source),
  });

  if (result instanceof type.errors) {
    const fields = Object.entries(formatErrors(result)).map(([field, message]) => ({
      field: isServerField(field) ? SERVER_ENV_VARS[field] : field,
      message,
    }));
    throw new ValidationError(
      `Invalid server configuration: ${fields.map((f) => `${f.field}: ${f.message}`).join("; ")}`,
      fields
    );
  }

  return {
    ...result,
    tokenCleanupIntervalMs:
      result.tokenCleanupInterval === "0" ? 0 : parseDuration(result.tokenCleanupInterval) * 1000,
  };
}

/**
 * Load server, database and auth settings in one go
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
  return {
    server: loadServerConfig(source),
    database: loadDatabaseConfig(source),
    auth: loadAuthConfig(source),
  };
}
