/**
 * In-memory stores
 * Suitable for development, testing, and single-instance deployments
 */

import { AccountAlreadyExistsError, AccountNotFoundError } from '@vouch/core';
import { withSignal } from './signal.js';
import type {
  Account,
  AccountStore,
  CreateAccountInput,
  CreateRefreshTokenInput,
  RefreshTokenRecord,
  RefreshTokenStore,
  StoreOptions,
  UpdateAccountInput,
} from './types.js';

export interface MemoryStoreConfig {
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

// Callers get copies so they cannot mutate stored state
const copyAccount = (account: Account): Account => ({ ...account });
const copyRecord = (record: RefreshTokenRecord): RefreshTokenRecord => ({ ...record });

/**
 * Accounts keyed by id, with a unique index on email
 */
export class MemoryAccountStore implements AccountStore {
  private readonly accounts = new Map<string, Account>();
  private readonly now: () => number;

  constructor(config: MemoryStoreConfig = {}) {
    this.now = config.now ?? Date.now;
  }

  private live(account: Account | undefined): Account | null {
    return account && account.deletedAt === null ? account : null;
  }

  // Soft-deleted rows keep their email, as a unique index over the column would
  private emailTaken(email: string, exceptId?: string): boolean {
    for (const account of this.accounts.values()) {
      if (account.email === email && account.id !== exceptId) return true;
    }
    return false;
  }

  async create(input: CreateAccountInput, options?: StoreOptions): Promise<Account> {
    return withSignal(options?.signal, async () => {
      if (this.emailTaken(input.email)) {
        throw new AccountAlreadyExistsError();
      }
      if (this.accounts.has(input.id)) {
        throw new Error(`Duplicate account id ${input.id}`);
      }

      const now = new Date(this.now());
      const account: Account = { ...input, createdAt: now, updatedAt: now, deletedAt: null };
      this.accounts.set(account.id, account);
      return copyAccount(account);
    });
  }

  async findById(id: string, options?: StoreOptions): Promise<Account | null> {
    return withSignal(options?.signal, async () => {
      const account = this.live(this.accounts.get(id));
      return account ? copyAccount(account) : null;
    });
  }

  async findByEmail(email: string, options?: StoreOptions): Promise<Account | null> {
    return withSignal(options?.signal, async () => {
      for (const account of this.accounts.values()) {
        if (account.email === email && account.deletedAt === null) return copyAccount(account);
      }
      return null;
    });
  }

  async update(id: string, input: UpdateAccountInput, options?: StoreOptions): Promise<Account> {
    return withSignal(options?.signal, async () => {
      const account = this.live(this.accounts.get(id));
      if (!account) throw new AccountNotFoundError();
      if (input.email !== undefined && this.emailTaken(input.email, id)) {
        throw new AccountAlreadyExistsError();
      }

      const updated: Account = {
        ...account,
        ...(input.email !== undefined && { email: input.email }),
        ...(input.passwordHash !== undefined && { passwordHash: input.passwordHash }),
        ...(input.name !== undefined && { name: input.name }),
        updatedAt: new Date(this.now()),
      };
      this.accounts.set(id, updated);
      return copyAccount(updated);
    });
  }

  async delete(id: string, options?: StoreOptions): Promise<boolean> {
    return withSignal(options?.signal, async () => {
      const account = this.live(this.accounts.get(id));
      if (!account) return false;

      const now = new Date(this.now());
      this.accounts.set(id, { ...account, deletedAt: now, updatedAt: now });
      return true;
    });
  }

  /** Number of stored accounts, soft-deleted included */
  get size(): number {
    return this.accounts.size;
  }
}

/**
 * Refresh tokens keyed by token value. Ids count up from 1 like a bigserial column.
 */
export class MemoryRefreshTokenStore implements RefreshTokenStore {
  private readonly records = new Map<string, RefreshTokenRecord>();
  private nextId = 1;
  private readonly now: () => number;

  constructor(config: MemoryStoreConfig = {}) {
    this.now = config.now ?? Date.now;
  }

  private insert(input: CreateRefreshTokenInput): RefreshTokenRecord {
    if (this.records.has(input.token)) {
      throw new Error('Duplicate refresh token value');
    }

    const now = new Date(this.now());
    const record: RefreshTokenRecord = {
      id: this.nextId++,
      accountId: input.accountId,
      token: input.token,
      expiresAt: input.expiresAt,
      isRevoked: false,
      createdAt: now,
      updatedAt: now,
    };
    this.records.set(record.token, record);
    return record;
  }

  private revokeRecord(record: RefreshTokenRecord): void {
    this.records.set(record.token, { ...record, isRevoked: true, updatedAt: new Date(this.now()) });
  }

  async create(input: CreateRefreshTokenInput, options?: StoreOptions): Promise<RefreshTokenRecord> {
    return withSignal(options?.signal, async () => copyRecord(this.insert(input)));
  }

  async findByToken(token: string, options?: StoreOptions): Promise<RefreshTokenRecord | null> {
    return withSignal(options?.signal, async () => {
      const record = this.records.get(token);
      return record ? copyRecord(record) : null;
    });
  }

  async findByAccountId(accountId: string, options?: StoreOptions): Promise<RefreshTokenRecord[]> {
    return withSignal(options?.signal, async () =>
      [...this.records.values()]
        .filter((record) => record.accountId === accountId && !record.isRevoked)
        .sort((a, b) => a.id - b.id)
        .map(copyRecord)
    );
  }

  async revoke(token: string, options?: StoreOptions): Promise<boolean> {
    return withSignal(options?.signal, async () => {
      const record = this.records.get(token);
      if (!record || record.isRevoked) return false;
      this.revokeRecord(record);
      return true;
    });
  }

  async revokeAllByAccountId(accountId: string, options?: StoreOptions): Promise<number> {
    return withSignal(options?.signal, async () => {
      let count = 0;
      for (const record of [...this.records.values()]) {
        if (record.accountId === accountId && !record.isRevoked) {
          this.revokeRecord(record);
          count++;
        }
      }
      return count;
    });
  }

  async deleteExpired(now: Date, options?: StoreOptions): Promise<number> {
    return withSignal(options?.signal, async () => {
      let count = 0;
      for (const record of [...this.records.values()]) {
        if (record.expiresAt.getTime() <= now.getTime()) {
          this.records.delete(record.token);
          count++;
        }
      }
      return count;
    });
  }

  // Check, revoke and insert run without an await between them, so no other call interleaves
  async rotate(
    oldToken: string,
    replacement: CreateRefreshTokenInput,
    options?: StoreOptions
  ): Promise<RefreshTokenRecord | null> {
    return withSignal(options?.signal, async () => {
      const record = this.records.get(oldToken);
      if (!record || record.isRevoked) return null;
      if (this.records.has(replacement.token)) {
        throw new Error('Duplicate refresh token value');
      }

      this.revokeRecord(record);
      return copyRecord(this.insert(replacement));
    });
  }

  /** Number of stored records, revoked included */
  get size(): number {
    return this.records.size;
  }
}

/**
 * Create a matched pair of memory stores
 */
export function createMemoryStores(config?: MemoryStoreConfig): {
  accounts: MemoryAccountStore;
  refreshTokens: MemoryRefreshTokenStore;
} {
  return {
    accounts: new MemoryAccountStore(config),
    refreshTokens: new MemoryRefreshTokenStore(config),
  };
}
