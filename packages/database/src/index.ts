/**
 * @module
 * Postgres access for vouch: a postgres.js pool with Drizzle on top,
 * environment config and the SQL migration runner.
 *
 * @example
 * ```typescript
 * import { createPostgresAdapter, loadDatabaseConfig, runMigrations, MIGRATIONS_DIR } from '@vouch/database';
 *
 * const db = await createPostgresAdapter(loadDatabaseConfig());
 * await runMigrations(db, MIGRATIONS_DIR);
 *
 * const orm = db.drizzle();
 * ```
 */

import { fileURLToPath } from "node:url";

/** Directory holding the bundled *.sql migrations */
export const MIGRATIONS_DIR = fileURLToPath(new URL("../migrations", import.meta.url));

// Types
export {
  type SslMode,
  type PostgresConfig,
  type Row,
  type SqlRunner,
  type MigrationExecutor,
  type MigrationResult,
  type DatabaseErrorCode,
  DatabaseError,
  DatabaseErrorCodes,
} from "./types.js";

// Config
export { loadDatabaseConfig, type DatabaseConfig } from "./config.js";

// Adapters
export {
  PostgresAdapter,
  createPostgresAdapter,
} from "./adapters/postgres.js";

// Migrations
export {
  runMigrations,
  listMigrations,
  MIGRATIONS_TABLE,
  type MigrateOptions,
} from "./migrator.js";

// Utilities
export {
  parseConnectionString,
  buildConnectionString,
  redactConnectionString,
  isSslMode,
} from "./utils.js";
