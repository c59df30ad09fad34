/**
 * Session Service
 * Register, login, refresh and logout over the stores, the JWT manager and the
 * refresh token manager. Every operation resolves to a SessionResult and never throws.
 */

import {
  AccountAlreadyExistsError,
  AccountNotFoundError,
  InternalError,
  InvalidCredentialsError,
  InvalidTokenError,
  TokenExpiredError,
  TokenRevokedError,
  createLogger,
  type Logger,
} from '@vouch/core';
import type { AccessTokenClaims, JsonWebKeySet } from '@vouch/types';
import { JwtError, isAuthFailure, type AuthFailure } from '../errors.js';
import type { JwtManager } from '../session/jwt-manager.js';
import { getRefreshTokenState, type RefreshTokenManager } from '../session/refresh-token.js';
import type { Account, AccountStore, RefreshTokenStore } from '../storage/types.js';
import { generateAccountId } from '../utils/crypto.js';
import { DEFAULT_PBKDF2_ITERATIONS, hashPassword, verifyPassword } from '../utils/password.js';

/**
 * Outcome of a session operation
 */
export type SessionResult<T> =
  | { success: true; data: T }
  | { success: false; error: AuthFailure };

export interface OperationOptions {
  /** Aborts every store call made by the operation */
  signal?: AbortSignal;
}

export interface RegisterInput {
  email: string;
  password: string;
  name: string;
}

export interface LoginInput {
  email: string;
  password: string;
}

export interface AccountProfile {
  id: string;
  email: string;
  name: string;
}

/**
 * Token pair handed to a client after register, login or refresh
 */
export interface IssuedSession {
  accessToken: string;
  refreshToken: string;
  tokenType: 'Bearer';
  /** Access token lifetime in seconds */
  expiresIn: number;
  accessExpiresAt: Date;
  refreshExpiresAt: Date;
  account: AccountProfile;
}

/**
 * An active refresh session, without its token value
 */
export interface SessionInfo {
  id: number;
  createdAt: Date;
  expiresAt: Date;
}

export interface SessionServiceConfig {
  accounts: AccountStore;
  refreshTokens: RefreshTokenStore;
  jwt: JwtManager;
  refreshTokenManager: RefreshTokenManager;
  /** PBKDF2 cost for new password hashes (default: 100000) */
  passwordIterations?: number;
  logger?: Logger;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

// Verified against when the account does not exist, so both login paths derive a key
const DUMMY_PASSWORD = 'vouch-dummy-password';

function toProfile(account: Account): AccountProfile {
  return { id: account.id, email: account.email, name: account.name };
}

export class SessionService {
  private readonly accounts: AccountStore;
  private readonly refreshTokens: RefreshTokenStore;
  private readonly jwt: JwtManager;
  private readonly refreshTokenManager: RefreshTokenManager;
  private readonly passwordIterations: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private dummyHash: Promise<string> | undefined;

  constructor(config: SessionServiceConfig) {
    this.accounts = config.accounts;
    this.refreshTokens = config.refreshTokens;
    this.jwt = config.jwt;
    this.refreshTokenManager = config.refreshTokenManager;
    this.passwordIterations = config.passwordIterations ?? DEFAULT_PBKDF2_ITERATIONS;
    this.logger = (config.logger ?? createLogger({ name: 'auth' })).child({ component: 'session-service' });
    this.now = config.now ?? Date.now;
  }

  /**
   * Run an operation, turning throws into failures. Anything outside the
   * AuthFailure union is logged and replaced by InternalError.
   */
  private async run<T>(
    operation: string,
    context: Record<string, unknown>,
    fn: () => Promise<T>,
    failureLevel: 'warn' | 'debug' = 'warn'
  ): Promise<SessionResult<T>> {
    try {
      return { success: true, data: await fn() };
    } catch (error) {
      if (isAuthFailure(error) && !(error instanceof InternalError)) {
        this.logger[failureLevel](`${operation} failed`, { ...context, code: error.code });
        return { success: false, error };
      }

      const cause = error instanceof InternalError ? error.cause : error;
      if (cause instanceof Error) {
        this.logger.error(`${operation} failed`, cause, context);
      } else {
        this.logger.error(`${operation} failed`, { ...context, error: String(cause) });
      }
      return {
        success: false,
        error: error instanceof InternalError ? error : new InternalError(undefined, { cause: error }),
      };
    }
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= hashPassword(DUMMY_PASSWORD, { iterations: this.passwordIterations });
    return this.dummyHash;
  }

  /**
   * Issue an access token and a refresh token, and persist the refresh record
   */
  private async issueTokenPair(account: Account, options: OperationOptions): Promise<IssuedSession> {
    const access = await this.jwt.issueAccessToken(account.id, account.email);
    const refresh = this.refreshTokenManager.issue();

    await this.refreshTokens.create(
      { accountId: account.id, token: refresh.token, expiresAt: refresh.expiresAt },
      options
    );

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      tokenType: 'Bearer',
      expiresIn: access.expiresIn,
      accessExpiresAt: access.expiresAt,
      refreshExpiresAt: refresh.expiresAt,
      account: toProfile(account),
    };
  }

  /**
   * Create an account and sign it in
   */
  async register(input: RegisterInput, options: OperationOptions = {}): Promise<SessionResult<IssuedSession>> {
    return this.run('register', {}, async () => {
      const existing = await this.accounts.findByEmail(input.email, options);
      if (existing) {
        throw new AccountAlreadyExistsError();
      }

      const passwordHash = await hashPassword(input.password, { iterations: this.passwordIterations });
      // A concurrent registration that wins the race surfaces here as AccountAlreadyExistsError
      const account = await this.accounts.create(
        { id: generateAccountId(), email: input.email, passwordHash, name: input.name },
        options
      );

      const session = await this.issueTokenPair(account, options);
      this.logger.info('Account registered', { accountId: account.id });
      return session;
    });
  }

  /**
   * Check credentials and sign in. An unknown email and a wrong password fail the same way.
   */
  async login(input: LoginInput, options: OperationOptions = {}): Promise<SessionResult<IssuedSession>> {
    return this.run('login', {}, async () => {
      const account = await this.accounts.findByEmail(input.email, options);

      if (!account) {
        await verifyPassword(input.password, await this.getDummyHash());
        throw new InvalidCredentialsError();
      }

      if (!(await verifyPassword(input.password, account.passwordHash))) {
        throw new InvalidCredentialsError();
      }

      const session = await this.issueTokenPair(account, options);
      this.logger.info('Account logged in', { accountId: account.id });
      return session;
    });
  }

  /**
   * Exchange a refresh token for a new pair. The presented token is revoked;
   * a second redeem of it fails with TokenRevoked.
   */
  async refresh(refreshToken: string, options: OperationOptions = {}): Promise<SessionResult<IssuedSession>> {
    return this.run('refresh', {}, async () => {
      const record = await this.refreshTokens.findByToken(refreshToken, options);
      if (!record) {
        throw new InvalidTokenError('Invalid refresh token');
      }

      const state = getRefreshTokenState(record, new Date(this.now()));
      if (state === 'revoked') throw new TokenRevokedError();
      if (state === 'expired') throw new TokenExpiredError();

      const account = await this.accounts.findById(record.accountId, options);
      if (!account) {
        throw new AccountNotFoundError();
      }

      const access = await this.jwt.issueAccessToken(account.id, account.email);
      const next = this.refreshTokenManager.issue();

      const rotated = await this.refreshTokens.rotate(
        refreshToken,
        { accountId: account.id, token: next.token, expiresAt: next.expiresAt },
        options
      );
      if (!rotated) {
        throw new TokenRevokedError();
      }

      const session: IssuedSession = {
        accessToken: access.token,
        refreshToken: next.token,
        tokenType: 'Bearer',
        expiresIn: access.expiresIn,
        accessExpiresAt: access.expiresAt,
        refreshExpiresAt: next.expiresAt,
        account: toProfile(account),
      };
      this.logger.info('Session refreshed', { accountId: account.id });
      return session;
    });
  }

  /**
   * Revoke one refresh token. Unknown and already-revoked tokens succeed without effect.
   */
  async logout(refreshToken: string, options: OperationOptions = {}): Promise<SessionResult<{ revoked: boolean }>> {
    return this.run('logout', {}, async () => {
      const revoked = await this.refreshTokens.revoke(refreshToken, options);
      this.logger.info('Logged out', { revoked });
      return { revoked };
    });
  }

  /**
   * Revoke every active refresh token of an account
   */
  async logoutAll(accountId: string, options: OperationOptions = {}): Promise<SessionResult<{ revokedCount: number }>> {
    return this.run('logoutAll', { accountId }, async () => {
      const revokedCount = await this.refreshTokens.revokeAllByAccountId(accountId, options);
      this.logger.info('Logged out from all devices', { accountId, revokedCount });
      return { revokedCount };
    });
  }

  /**
   * Verify an access token. Every rejection is InvalidToken; the reason is only logged.
   */
  async validateAccessToken(token: string): Promise<SessionResult<AccessTokenClaims>> {
    return this.run(
      'validateAccessToken',
      {},
      async () => {
        try {
          return await this.jwt.verifyAccessToken(token);
        } catch (error) {
          if (error instanceof JwtError) {
            this.logger.debug('Access token rejected', { reason: error.reason });
            throw new InvalidTokenError(undefined, undefined, { cause: error });
          }
          throw error;
        }
      },
      'debug'
    );
  }

  async getProfile(accountId: string, options: OperationOptions = {}): Promise<SessionResult<AccountProfile>> {
    return this.run('getProfile', { accountId }, async () => {
      const account = await this.accounts.findById(accountId, options);
      if (!account) {
        throw new AccountNotFoundError();
      }
      return toProfile(account);
    });
  }

  /**
   * Active refresh sessions of an account, oldest first. Expired records are left out.
   */
  async listSessions(accountId: string, options: OperationOptions = {}): Promise<SessionResult<SessionInfo[]>> {
    return this.run('listSessions', { accountId }, async () => {
      const now = new Date(this.now());
      const records = await this.refreshTokens.findByAccountId(accountId, options);
      return records
        .filter((record) => getRefreshTokenState(record, now) === 'active')
        .map((record) => ({ id: record.id, createdAt: record.createdAt, expiresAt: record.expiresAt }));
    });
  }

  /**
   * Delete refresh records past their expiry
   */
  async purgeExpiredTokens(options: OperationOptions = {}): Promise<SessionResult<{ deletedCount: number }>> {
    return this.run('purgeExpiredTokens', {}, async () => {
      const deletedCount = await this.refreshTokens.deleteExpired(new Date(this.now()), options);
      if (deletedCount > 0) {
        this.logger.info('Expired refresh tokens purged', { deletedCount });
      }
      return { deletedCount };
    });
  }

  getPublicKeySet(): JsonWebKeySet {
    return this.jwt.getPublicKeySet();
  }
}

export function createSessionService(config: SessionServiceConfig): SessionService {
  return new SessionService(config);
}
