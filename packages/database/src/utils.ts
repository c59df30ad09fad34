/**
 * @vouch/database - Utilities
 * Connection string helpers
 */

import type { PostgresConfig, SslMode } from "./types.js";
import { DatabaseError, DatabaseErrorCodes } from "./types.js";

const SSL_MODES: readonly SslMode[] = ["disable", "allow", "prefer", "require", "verify-full"];

export function isSslMode(value: string): value is SslMode {
  return SSL_MODES.some((mode) => mode === value);
}

/**
 * Parse a PostgreSQL connection string.
 * `sslmode` is read from the query string and defaults to "disable".
 */
export function parseConnectionString(
  connectionString: string
): Required<Pick<PostgresConfig, "host" | "port" | "user" | "password" | "database" | "sslMode">> {
  let url: URL;
  try {
    url = new URL(connectionString);
  } catch (err) {
    throw new DatabaseError("Invalid connection string", DatabaseErrorCodes.INVALID_CONFIG, {
      cause: err,
    });
  }

  if (url.protocol !== "postgres:" && url.protocol !== "postgresql:") {
    throw new DatabaseError(
      `Unsupported database URL scheme: ${url.protocol}`,
      DatabaseErrorCodes.INVALID_CONFIG
    );
  }

  const sslMode = url.searchParams.get("sslmode") ?? "disable";
  if (!isSslMode(sslMode)) {
    throw new DatabaseError(`Unsupported sslmode: ${sslMode}`, DatabaseErrorCodes.INVALID_CONFIG);
  }

  return {
    host: url.hostname,
    port: parseInt(url.port || "5432", 10),
    user: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    database: decodeURIComponent(url.pathname.slice(1)),
    sslMode,
  };
}

/**
 * Build a PostgreSQL connection string
 */
export function buildConnectionString(config: {
  host: string;
  port?: number;
  user: string;
  password: string;
  database: string;
  sslMode?: SslMode;
}): string {
  const url = new URL(`postgresql://${config.host}`);
  url.port = String(config.port ?? 5432);
  url.username = encodeURIComponent(config.user);
  url.password = encodeURIComponent(config.password);
  url.pathname = `/${encodeURIComponent(config.database)}`;

  if (config.sslMode && config.sslMode !== "disable") {
    url.searchParams.set("sslmode", config.sslMode);
  }

  return url.toString();
}

/**
 * Connection string with the password masked, for logs
 */
export function redactConnectionString(connectionString: string): string {
  const url = new URL(connectionString);
  if (url.password) {
    url.password = "***";
  }
  return url.toString();
}
