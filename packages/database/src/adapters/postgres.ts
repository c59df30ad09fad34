/**
 * @vouch/database - PostgreSQL Adapter
 * PostgreSQL adapter using postgres.js
 */

import postgres from "postgres";
import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type {
  MigrationExecutor,
  PostgresConfig,
  Row,
  SqlRunner,
} from "../types.js";
import { DatabaseError, DatabaseErrorCodes } from "../types.js";

type Queryable = Pick<postgres.Sql, "unsafe">;

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : "Unknown error";
}

function toRunner(client: Queryable): SqlRunner {
  return {
    async query(sql: string, params?: string[]): Promise<Row[]> {
      try {
        return await client.unsafe(sql, params);
      } catch (err) {
        throw new DatabaseError(`Query failed: ${messageOf(err)}`, DatabaseErrorCodes.QUERY_FAILED, {
          cause: err,
        });
      }
    },
  };
}

/**
 * PostgreSQL Database Adapter
 *
 * @example
 * ```typescript
 * const db = await createPostgresAdapter({
 *   host: 'localhost',
 *   port: 5432,
 *   user: 'postgres',
 *   password: 'postgres',
 *   database: 'auth_service',
 * });
 *
 * const stores = createDrizzleStores(db.drizzle());
 *
 * // Close when done
 * await db.close();
 * ```
 */
export class PostgresAdapter implements MigrationExecutor {
  readonly type = "postgres" as const;

  private client: postgres.Sql | null = null;
  private db: PostgresJsDatabase | null = null;
  private readonly config: PostgresConfig;

  constructor(config: PostgresConfig) {
    this.config = config;
  }

  /**
   * Open the pool and check that the server answers
   */
  async connect(): Promise<void> {
    if (this.client) return;

    const sslMode = this.config.sslMode ?? "disable";
    const client = postgres({
      host: this.config.host,
      port: this.config.port,
      user: this.config.user,
      password: this.config.password,
      database: this.config.database,
      ssl: sslMode === "disable" ? false : sslMode,
      max: this.config.poolSize ?? 10,
      onnotice: () => {},
    });

    try {
      await client.unsafe("SELECT 1");
    } catch (err) {
      await client.end({ timeout: 0 });
      throw new DatabaseError(
        `Failed to connect to PostgreSQL: ${messageOf(err)}`,
        DatabaseErrorCodes.CONNECTION_FAILED,
        { cause: err }
      );
    }

    this.client = client;
    this.db = drizzle(client, { logger: this.config.logging ?? false });
  }

  private requireClient(): postgres.Sql {
    if (!this.client) {
      throw new DatabaseError(
        "Database not connected. Call connect() first.",
        DatabaseErrorCodes.CONNECTION_FAILED
      );
    }
    return this.client;
  }

  async query(sql: string, params?: string[]): Promise<Row[]> {
    return toRunner(this.requireClient()).query(sql, params);
  }

  async transaction(fn: (tx: SqlRunner) => Promise<void>): Promise<void> {
    const client = this.requireClient();
    await client.begin(async (tx) => {
      await fn(toRunner(tx));
    });
  }

  async ping(): Promise<boolean> {
    try {
      await this.query("SELECT 1");
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Get the Drizzle instance over this pool
   */
  drizzle(): PostgresJsDatabase {
    if (!this.db) {
      throw new DatabaseError(
        "Database not connected. Call connect() first.",
        DatabaseErrorCodes.CONNECTION_FAILED
      );
    }
    return this.db;
  }

  async close(): Promise<void> {
    if (this.client) {
      const client = this.client;
      this.client = null;
      this.db = null;
      await client.end({ timeout: 5 });
    }
  }
}

/**
 * Create and connect a PostgreSQL adapter
 */
export async function createPostgresAdapter(config: PostgresConfig): Promise<PostgresAdapter> {
  const adapter = new PostgresAdapter(config);
  await adapter.connect();
  return adapter;
}
