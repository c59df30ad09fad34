/**
 * Store interfaces
 * The session service reaches persistence only through these. One adapter per backend.
 */

/**
 * Per-call options. An aborted signal rejects the call with the signal's reason.
 * The backend work is abandoned, not cancelled: a write in flight may still commit,
 * so an aborted rotate can leave the presented token revoked.
 */
export interface StoreOptions {
  signal?: AbortSignal;
}

/**
 * Stored account
 */
export interface Account {
  /** 16-character opaque id */
  id: string;
  /** Unique, case-sensitive as stored */
  email: string;
  passwordHash: string;
  name: string;
  createdAt: Date;
  updatedAt: Date;
  /** Soft-delete marker; finds skip rows where this is set */
  deletedAt: Date | null;
}

export interface CreateAccountInput {
  id: string;
  email: string;
  passwordHash: string;
  name: string;
}

export type UpdateAccountInput = Partial<Pick<Account, 'email' | 'passwordHash' | 'name'>>;

/**
 * Stored refresh token
 */
export interface RefreshTokenRecord {
  id: number;
  accountId: string;
  /** 64 hex characters, unique across all records */
  token: string;
  expiresAt: Date;
  /** Never goes back to false once set */
  isRevoked: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateRefreshTokenInput {
  accountId: string;
  token: string;
  expiresAt: Date;
}

/**
 * Account persistence
 */
export interface AccountStore {
  /** Throws AccountAlreadyExistsError when the email is taken */
  create(input: CreateAccountInput, options?: StoreOptions): Promise<Account>;
  findById(id: string, options?: StoreOptions): Promise<Account | null>;
  findByEmail(email: string, options?: StoreOptions): Promise<Account | null>;
  /** Throws AccountNotFoundError when no live row matches */
  update(id: string, input: UpdateAccountInput, options?: StoreOptions): Promise<Account>;
  /** Soft delete. Resolves false when no live row matched. */
  delete(id: string, options?: StoreOptions): Promise<boolean>;
}

/**
 * Refresh token persistence
 */
export interface RefreshTokenStore {
  create(input: CreateRefreshTokenInput, options?: StoreOptions): Promise<RefreshTokenRecord>;
  /** Includes revoked and expired records */
  findByToken(token: string, options?: StoreOptions): Promise<RefreshTokenRecord | null>;
  /** Non-revoked records only, oldest first */
  findByAccountId(accountId: string, options?: StoreOptions): Promise<RefreshTokenRecord[]>;
  /** Resolves true when a non-revoked record was flipped */
  revoke(token: string, options?: StoreOptions): Promise<boolean>;
  /** Resolves with the number of records flipped */
  revokeAllByAccountId(accountId: string, options?: StoreOptions): Promise<number>;
  /** Deletes records with expiresAt <= now; resolves with the number deleted */
  deleteExpired(now: Date, options?: StoreOptions): Promise<number>;
  /**
   * Revoke oldToken and insert the replacement as one atomic unit.
   * Resolves null, writing nothing, when oldToken is unknown or already revoked.
   */
  rotate(
    oldToken: string,
    replacement: CreateRefreshTokenInput,
    options?: StoreOptions
  ): Promise<RefreshTokenRecord | null>;
}
