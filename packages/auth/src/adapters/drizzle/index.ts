/**
 * Drizzle ORM stores for PostgreSQL
 *
 * @example
 * ```typescript
 * import { drizzle } from 'drizzle-orm/postgres-js';
 * import postgres from 'postgres';
 *
 * const db = drizzle(postgres(process.env.DATABASE_URL));
 * const { accounts, refreshTokens } = createDrizzleStores(db);
 * ```
 */

import { and, asc, eq, isNull, lte } from 'drizzle-orm';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { AccountAlreadyExistsError, AccountNotFoundError } from '@vouch/core';
import { withSignal } from '../../storage/signal.js';
import type {
  Account,
  AccountStore,
  CreateAccountInput,
  CreateRefreshTokenInput,
  RefreshTokenRecord,
  RefreshTokenStore,
  StoreOptions,
  UpdateAccountInput,
} from '../../storage/types.js';
import { accounts, refreshTokens, type AccountRow, type RefreshTokenRow } from './schema.js';

export * from './schema.js';

/**
 * Database handle from drizzle-orm/postgres-js, without a relational schema
 */
export type DrizzleDb = PostgresJsDatabase;

/** Postgres unique_violation */
export const UNIQUE_VIOLATION = '23505';

/**
 * Whether a driver error (or its cause) is a unique-constraint violation
 */
export function isUniqueViolation(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && current.code === UNIQUE_VIOLATION) return true;
    current = 'cause' in current ? current.cause : undefined;
  }
  return false;
}

export function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.passwordHash,
    name: row.name,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    deletedAt: row.deletedAt,
  };
}

export function toRefreshTokenRecord(row: RefreshTokenRow): RefreshTokenRecord {
  return {
    id: row.id,
    accountId: row.accountId,
    token: row.token,
    expiresAt: row.expiresAt,
    isRevoked: row.isRevoked,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Drizzle-backed account store. Soft-deleted rows are invisible to every lookup.
 */
export class DrizzleAccountStore implements AccountStore {
  constructor(private readonly db: DrizzleDb) {}

  async create(input: CreateAccountInput, options?: StoreOptions): Promise<Account> {
    return withSignal(options?.signal, async () => {
      try {
        const [row] = await this.db.insert(accounts).values(input).returning();
        if (!row) throw new Error('Account insert returned no row');
        return toAccount(row);
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new AccountAlreadyExistsError();
        }
        throw error;
      }
    });
  }

  async findById(id: string, options?: StoreOptions): Promise<Account | null> {
    return withSignal(options?.signal, async () => {
      const [row] = await this.db
        .select()
        .from(accounts)
        .where(and(eq(accounts.id, id), isNull(accounts.deletedAt)))
        .limit(1);
      return row ? toAccount(row) : null;
    });
  }

  async findByEmail(email: string, options?: StoreOptions): Promise<Account | null> {
    return withSignal(options?.signal, async () => {
      const [row] = await this.db
        .select()
        .from(accounts)
        .where(and(eq(accounts.email, email), isNull(accounts.deletedAt)))
        .limit(1);
      return row ? toAccount(row) : null;
    });
  }

  async update(id: string, input: UpdateAccountInput, options?: StoreOptions): Promise<Account> {
    return withSignal(options?.signal, async () => {
      try {
        const [row] = await this.db
          .update(accounts)
          .set({ ...input, updatedAt: new Date() })
          .where(and(eq(accounts.id, id), isNull(accounts.deletedAt)))
          .returning();
        if (!row) throw new AccountNotFoundError();
        return toAccount(row);
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new AccountAlreadyExistsError();
        }
        throw error;
      }
    });
  }

  async delete(id: string, options?: StoreOptions): Promise<boolean> {
    return withSignal(options?.signal, async () => {
      const now = new Date();
      const rows = await this.db
        .update(accounts)
        .set({ deletedAt: now, updatedAt: now })
        .where(and(eq(accounts.id, id), isNull(accounts.deletedAt)))
        .returning({ id: accounts.id });
      return rows.length > 0;
    });
  }
}

/**
 * Drizzle-backed refresh token store
 */
export class DrizzleRefreshTokenStore implements RefreshTokenStore {
  constructor(private readonly db: DrizzleDb) {}

  async create(input: CreateRefreshTokenInput, options?: StoreOptions): Promise<RefreshTokenRecord> {
    return withSignal(options?.signal, async () => {
      const [row] = await this.db.insert(refreshTokens).values(input).returning();
      if (!row) throw new Error('Refresh token insert returned no row');
      return toRefreshTokenRecord(row);
    });
  }

  async findByToken(token: string, options?: StoreOptions): Promise<RefreshTokenRecord | null> {
    return withSignal(options?.signal, async () => {
      const [row] = await this.db
        .select()
        .from(refreshTokens)
        .where(eq(refreshTokens.token, token))
        .limit(1);
      return row ? toRefreshTokenRecord(row) : null;
    });
  }

  async findByAccountId(accountId: string, options?: StoreOptions): Promise<RefreshTokenRecord[]> {
    return withSignal(options?.signal, async () => {
      const rows = await this.db
        .select()
        .from(refreshTokens)
        .where(and(eq(refreshTokens.accountId, accountId), eq(refreshTokens.isRevoked, false)))
        .orderBy(asc(refreshTokens.id));
      return rows.map(toRefreshTokenRecord);
    });
  }

  async revoke(token: string, options?: StoreOptions): Promise<boolean> {
    return withSignal(options?.signal, async () => {
      const rows = await this.db
        .update(refreshTokens)
        .set({ isRevoked: true, updatedAt: new Date() })
        .where(and(eq(refreshTokens.token, token), eq(refreshTokens.isRevoked, false)))
        .returning({ id: refreshTokens.id });
      return rows.length > 0;
    });
  }

  async revokeAllByAccountId(accountId: string, options?: StoreOptions): Promise<number> {
    return withSignal(options?.signal, async () => {
      const rows = await this.db
        .update(refreshTokens)
        .set({ isRevoked: true, updatedAt: new Date() })
        .where(and(eq(refreshTokens.accountId, accountId), eq(refreshTokens.isRevoked, false)))
        .returning({ id: refreshTokens.id });
      return rows.length;
    });
  }

  async deleteExpired(now: Date, options?: StoreOptions): Promise<number> {
    return withSignal(options?.signal, async () => {
      const rows = await this.db
        .delete(refreshTokens)
        .where(lte(refreshTokens.expiresAt, now))
        .returning({ id: refreshTokens.id });
      return rows.length;
    });
  }

  async rotate(
    oldToken: string,
    replacement: CreateRefreshTokenInput,
    options?: StoreOptions
  ): Promise<RefreshTokenRecord | null> {
    return withSignal(options?.signal, () =>
      this.db.transaction(async (tx) => {
        // The row lock taken by this UPDATE makes a concurrent rotation wait, then match nothing
        const revoked = await tx
          .update(refreshTokens)
          .set({ isRevoked: true, updatedAt: new Date() })
          .where(and(eq(refreshTokens.token, oldToken), eq(refreshTokens.isRevoked, false)))
          .returning({ id: refreshTokens.id });
        if (revoked.length === 0) return null;

        const [row] = await tx.insert(refreshTokens).values(replacement).returning();
        if (!row) throw new Error('Refresh token insert returned no row');
        return toRefreshTokenRecord(row);
      })
    );
  }
}

/**
 * Create the account and refresh token stores over one database handle
 */
export function createDrizzleStores(db: DrizzleDb): {
  accounts: DrizzleAccountStore;
  refreshTokens: DrizzleRefreshTokenStore;
} {
  return {
    accounts: new DrizzleAccountStore(db),
    refreshTokens: new DrizzleRefreshTokenStore(db),
  };
}
