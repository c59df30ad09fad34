/**
 * Refresh Token Manager
 * Opaque, long-lived tokens. The value is random; everything else lives in the store.
 */

import { generateRandomHex } from '../utils/crypto.js';
import { parseDuration } from './jwt-manager.js';

/** Random bytes per refresh token (hex-encoded to twice as many characters) */
export const REFRESH_TOKEN_BYTES = 32;

export interface RefreshTokenConfig {
  /** Refresh token TTL, as a duration string ('168h') or seconds (default: '7d') */
  ttl?: string | number;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

export interface IssuedRefreshToken {
  token: string;
  expiresAt: Date;
}

/**
 * The fields validity depends on
 */
export interface RefreshTokenStateInput {
  isRevoked: boolean;
  expiresAt: Date;
}

export type RefreshTokenState = 'active' | 'revoked' | 'expired';

/**
 * Revoked wins over expired: a revoked record stays revoked whatever the clock says.
 */
export function getRefreshTokenState(record: RefreshTokenStateInput, now: Date): RefreshTokenState {
  if (record.isRevoked) return 'revoked';
  if (now.getTime() >= record.expiresAt.getTime()) return 'expired';
  return 'active';
}

export function isRefreshTokenValid(record: RefreshTokenStateInput, now: Date): boolean {
  return getRefreshTokenState(record, now) === 'active';
}

export class RefreshTokenManager {
  private readonly ttlSeconds: number;
  private readonly now: () => number;

  constructor(config: RefreshTokenConfig = {}) {
    const ttl = config.ttl ?? '7d';
    this.ttlSeconds = typeof ttl === 'number' ? ttl : parseDuration(ttl);
    if (!Number.isInteger(this.ttlSeconds) || this.ttlSeconds <= 0) {
      throw new RangeError(`Refresh token lifetime must be a positive whole number of seconds, got ${ttl}`);
    }
    this.now = config.now ?? Date.now;
  }

  /** Lifetime in seconds */
  get ttl(): number {
    return this.ttlSeconds;
  }

  /**
   * Generate a token value and its expiry. Persisting it is the caller's job.
   */
  issue(): IssuedRefreshToken {
    return {
      token: generateRandomHex(REFRESH_TOKEN_BYTES),
      expiresAt: new Date(this.now() + this.ttlSeconds * 1000),
    };
  }
}

export function createRefreshTokenManager(config?: RefreshTokenConfig): RefreshTokenManager {
  return new RefreshTokenManager(config);
}
