import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLogger } from "@vouch/core";
import { listMigrations, runMigrations } from "./migrator.js";
import { MIGRATIONS_DIR } from "./index.js";
import { DatabaseError, type MigrationExecutor, type Row, type SqlRunner } from "./types.js";

/**
 * Records what a real connection would run. Statements inside a failed
 * transaction are discarded.
 */
class FakeExecutor implements MigrationExecutor {
  readonly versions: string[] = [];
  readonly statements: string[] = [];
  failOn: string | undefined;

  async query(sql: string): Promise<Row[]> {
    this.statements.push(sql);
    if (sql.startsWith("SELECT version")) {
      return this.versions.map((version) => ({ version }));
    }
    return [];
  }

  async transaction(fn: (tx: SqlRunner) => Promise<void>): Promise<void> {
    const statements: string[] = [];
    const versions: string[] = [];
    const tx: SqlRunner = {
      query: async (sql, params = []) => {
        if (this.failOn && sql.includes(this.failOn)) {
          throw new Error("syntax error");
        }
        if (sql.startsWith("INSERT INTO schema_migrations")) {
          versions.push(...params);
        } else {
          statements.push(sql);
        }
        return [];
      },
    };

    await fn(tx);
    this.statements.push(...statements);
    this.versions.push(...versions);
  }
}

const logger = createLogger({ level: "SILENT" });

describe("@vouch/database - runMigrations", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "vouch-migrations-"));
    await writeFile(join(dir, "0002_sessions.sql"), "CREATE TABLE b (id int);");
    await writeFile(join(dir, "0001_accounts.sql"), "CREATE TABLE a (id int);");
    await writeFile(join(dir, "README.md"), "notes");
    await mkdir(join(dir, "archive.sql"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should list only .sql files, in lexical order", async () => {
    expect(await listMigrations(dir)).toEqual(["0001_accounts.sql", "0002_sessions.sql"]);
  });

  it("should create the bookkeeping table first", async () => {
    const executor = new FakeExecutor();

    await runMigrations(executor, dir, { logger });

    expect(executor.statements[0]).toMatch(/^CREATE TABLE IF NOT EXISTS schema_migrations/);
  });

  it("should apply pending files in order and record them", async () => {
    const executor = new FakeExecutor();

    const result = await runMigrations(executor, dir, { logger });

    expect(result).toEqual({ applied: ["0001_accounts.sql", "0002_sessions.sql"], skipped: [] });
    expect(executor.versions).toEqual(["0001_accounts.sql", "0002_sessions.sql"]);
    expect(executor.statements.slice(2)).toEqual(["CREATE TABLE a (id int);", "CREATE TABLE b (id int);"]);
  });

  it("should skip files already recorded", async () => {
    const executor = new FakeExecutor();
    executor.versions.push("0001_accounts.sql");

    const result = await runMigrations(executor, dir, { logger });

    expect(result).toEqual({ applied: ["0002_sessions.sql"], skipped: ["0001_accounts.sql"] });
    expect(executor.statements).not.toContain("CREATE TABLE a (id int);");
  });

  it("should be a no-op on a second run", async () => {
    const executor = new FakeExecutor();
    await runMigrations(executor, dir, { logger });

    const again = await runMigrations(executor, dir, { logger });

    expect(again).toEqual({ applied: [], skipped: ["0001_accounts.sql", "0002_sessions.sql"] });
  });

  it("should stop at a failing file and leave it unrecorded", async () => {
    await writeFile(join(dir, "0002_sessions.sql"), "CREATE TABLE BROKEN");
    const executor = new FakeExecutor();
    executor.failOn = "BROKEN";

    const error = await runMigrations(executor, dir, { logger }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DatabaseError);
    expect(error).toMatchObject({
      code: "MIGRATION_FAILED",
      message: "Migration 0002_sessions.sql failed: syntax error",
    });
    expect(executor.versions).toEqual(["0001_accounts.sql"]);
  });

  it("should ship the schema migration", async () => {
    expect(await listMigrations(MIGRATIONS_DIR)).toContain("0001_create_accounts.sql");
  });
});
