/**
 * @vouch/database - Migrations
 * Applies *.sql files from a directory, oldest name first, once each
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { createLogger, type Logger } from "@vouch/core";
import type { MigrationExecutor, MigrationResult } from "./types.js";
import { DatabaseError, DatabaseErrorCodes } from "./types.js";

export const MIGRATIONS_TABLE = "schema_migrations";

const CREATE_MIGRATIONS_TABLE = `CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
  version text PRIMARY KEY,
  applied_at timestamptz NOT NULL DEFAULT now()
)`;

export interface MigrateOptions {
  logger?: Logger;
}

/**
 * List migration files in lexical order
 */
export async function listMigrations(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(".sql"))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Apply pending migrations. Each file runs in its own transaction together
 * with the row that records it, so a failed file leaves no trace.
 *
 * @example
 * ```typescript
 * const { applied } = await runMigrations(db, MIGRATIONS_DIR);
 * ```
 */
export async function runMigrations(
  executor: MigrationExecutor,
  dir: string,
  options: MigrateOptions = {}
): Promise<MigrationResult> {
  const log = (options.logger ?? createLogger({ name: "database" })).child({
    component: "migrator",
  });

  await executor.query(CREATE_MIGRATIONS_TABLE);

  const rows = await executor.query(`SELECT version FROM ${MIGRATIONS_TABLE}`);
  const recorded = new Set(rows.map((row) => String(row["version"])));

  const result: MigrationResult = { applied: [], skipped: [] };

  for (const file of await listMigrations(dir)) {
    if (recorded.has(file)) {
      result.skipped.push(file);
      continue;
    }

    const sql = await readFile(join(dir, file), "utf8");
    try {
      await executor.transaction(async (tx) => {
        await tx.query(sql);
        await tx.query(`INSERT INTO ${MIGRATIONS_TABLE} (version) VALUES ($1)`, [file]);
      });
    } catch (error) {
      throw new DatabaseError(
        `Migration ${file} failed: ${error instanceof Error ? error.message : String(error)}`,
        DatabaseErrorCodes.MIGRATION_FAILED,
        { cause: error }
      );
    }

    log.info("Migration applied", { version: file });
    result.applied.push(file);
  }

  if (result.applied.length === 0) {
    log.debug("No pending migrations", { skipped: result.skipped.length });
  }

  return result;
}
