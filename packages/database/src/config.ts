/**
 * Database configuration
 * DATABASE_URL wins over the DB_* variables when both are set
 */

import { getEnv, getEnvNumber, ValidationError, type EnvSource } from "@vouch/core";
import { databaseConfig, formatErrors, type, type DatabaseConfigInput } from "@vouch/types";
import { DatabaseError } from "./types.js";
import { parseConnectionString } from "./utils.js";

export type DatabaseConfig = DatabaseConfigInput;

const DB_ENV_VARS: Record<keyof DatabaseConfig, string> = {
  host: "DB_HOST",
  port: "DB_PORT",
  user: "DB_USER",
  password: "DB_PASSWORD",
  database: "DB_NAME",
  sslMode: "DB_SSLMODE",
  poolSize: "DB_POOL_SIZE",
};

function isDatabaseField(field: string): field is keyof DatabaseConfig {
  return Object.hasOwn(DB_ENV_VARS, field);
}

function envNameOf(field: string, fromUrl: boolean): string {
  if (!isDatabaseField(field)) return field;
  return fromUrl && field !== "poolSize" ? "DATABASE_URL" : DB_ENV_VARS[field];
}

/**
 * Load Postgres settings from environment variables.
 * Throws ValidationError naming the offending variables.
 */
export function loadDatabaseConfig(source: EnvSource = process.env): DatabaseConfig {
  const url = getEnv("DATABASE_URL", undefined, source);
  const poolSize = getEnvNumber("DB_POOL_SIZE", 10, source);

  let input: Record<string, unknown>;
  if (url !== undefined) {
    try {
      input = { ...parseConnectionString(url), poolSize };
    } catch (error) {
      if (error instanceof DatabaseError) {
        throw new ValidationError(`Invalid database configuration: DATABASE_URL: ${error.message}`, [
          { field: "DATABASE_URL", message: error.message },
        ]);
      }
      throw error;
    }
  } else {
    input = {
      host: getEnv("DB_HOST", "localhost", source),
      port: getEnvNumber("DB_PORT", 5432, source),
      user: getEnv("DB_USER", "postgres", source),
      password: getEnv("DB_PASSWORD", "postgres", source),
      database: getEnv("DB_NAME", "auth_service", source),
      sslMode: getEnv("DB_SSLMODE", "disable", source),
      poolSize,
    };
  }

  const result = databaseConfig(input);
  if (result instanceof type.errors) {
    const fields = Object.entries(formatErrors(result)).map(([field, message]) => ({
      field: envNameOf(field, url !== undefined),
      message,
    }));
    throw new ValidationError(
      `Invalid database configuration: ${fields.map((f) => `${f.field}: ${f.message}`).join("; ")}`,
      fields
    );
  }

  return result;
}
