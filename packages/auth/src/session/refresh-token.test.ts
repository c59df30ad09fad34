import { describe, it, expect } from 'vitest';
import {
  RefreshTokenManager,
  createRefreshTokenManager,
  getRefreshTokenState,
  isRefreshTokenValid,
} from './refresh-token.js';

const T0 = Date.UTC(2024, 0, 15, 10, 30, 0);

describe('@vouch/auth - RefreshTokenManager', () => {
  it('should issue 64 hex characters', () => {
    const { token } = new RefreshTokenManager().issue();

    expect(token).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should never repeat a token', () => {
    const manager = createRefreshTokenManager();
    const tokens = new Set(Array.from({ length: 100 }, () => manager.issue().token));

    expect(tokens.size).toBe(100);
  });

  it('should expire after the configured lifetime', () => {
    const manager = new RefreshTokenManager({ ttl: '168h', now: () => T0 });

    expect(manager.ttl).toBe(604800);
    expect(manager.issue().expiresAt).toEqual(new Date(T0 + 604800_000));
  });

  it('should default to seven days', () => {
    expect(new RefreshTokenManager().ttl).toBe(7 * 24 * 3600);
  });

  it('should reject a bad lifetime', () => {
    expect(() => new RefreshTokenManager({ ttl: -1 })).toThrow(RangeError);
    expect(() => new RefreshTokenManager({ ttl: 'forever' })).toThrow('Invalid duration format');
  });
});

describe('@vouch/auth - refresh token state', () => {
  const expiresAt = new Date(T0);

  it('should be active strictly before expiry', () => {
    const record = { isRevoked: false, expiresAt };

    expect(getRefreshTokenState(record, new Date(T0 - 1))).toBe('active');
    expect(isRefreshTokenValid(record, new Date(T0 - 1))).toBe(true);
  });

  it('should be expired at the expiry instant', () => {
    const record = { isRevoked: false, expiresAt };

    expect(getRefreshTokenState(record, new Date(T0))).toBe('expired');
    expect(isRefreshTokenValid(record, new Date(T0))).toBe(false);
  });

  it('should report revoked before expired', () => {
    const record = { isRevoked: true, expiresAt };

    expect(getRefreshTokenState(record, new Date(T0 - 1))).toBe('revoked');
    expect(getRefreshTokenState(record, new Date(T0 + 1))).toBe('revoked');
  });
});
