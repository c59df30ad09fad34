/**
 * @vouch/database - Type Definitions
 * Database types and interfaces
 */

import type { DatabaseConfigInput } from "@vouch/types";

/**
 * SSL mode, as in libpq's sslmode parameter
 */
export type SslMode = DatabaseConfigInput["sslMode"];

/**
 * PostgreSQL configuration
 */
export interface PostgresConfig {
  /** Database host */
  host: string;
  /** Database port */
  port: number;
  /** Database user */
  user: string;
  /** Database password */
  password: string;
  /** Database name */
  database: string;
  /** SSL mode (default: "disable") */
  sslMode?: SslMode | undefined;
  /** Connection pool size (default: 10) */
  poolSize?: number | undefined;
  /** Enable Drizzle query logging */
  logging?: boolean | undefined;
}

/** A result row, keyed by column name */
export type Row = Record<string, unknown>;

/**
 * Runs raw SQL. Parameters are bound as $1, $2, ...
 */
export interface SqlRunner {
  query(sql: string, params?: string[]): Promise<Row[]>;
}

/**
 * What the migration runner needs from a connection
 */
export interface MigrationExecutor extends SqlRunner {
  /** Run fn in one transaction; a rejection rolls it back */
  transaction(fn: (tx: SqlRunner) => Promise<void>): Promise<void>;
}

/**
 * Migration result
 */
export interface MigrationResult {
  /** Files applied by this run, in order */
  applied: string[];
  /** Files already recorded before this run */
  skipped: string[];
}

/**
 * Database error
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DatabaseError";
  }
}

/**
 * Common database error codes
 */
export const DatabaseErrorCodes = {
  CONNECTION_FAILED: "CONNECTION_FAILED",
  QUERY_FAILED: "QUERY_FAILED",
  TRANSACTION_FAILED: "TRANSACTION_FAILED",
  MIGRATION_FAILED: "MIGRATION_FAILED",
  INVALID_CONFIG: "INVALID_CONFIG",
} as const;

export type DatabaseErrorCode = (typeof DatabaseErrorCodes)[keyof typeof DatabaseErrorCodes];
