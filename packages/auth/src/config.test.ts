import { describe, it, expect } from 'vitest';
import { ValidationError } from '@vouch/core';
import { loadAuthConfig } from './config.js';

describe('@vouch/auth - loadAuthConfig', () => {
  it('should apply defaults', () => {
    expect(loadAuthConfig({})).toEqual({
      privateKeyPath: './keys/private_key.pem',
      publicKeyPath: './keys/public_key.pem',
      accessTokenTtl: '15m',
      refreshTokenTtl: '168h',
      issuer: 'auth-service',
      passwordIterations: 100000,
    });
  });

  it('should read every variable', () => {
    const config = loadAuthConfig({
      JWT_PRIVATE_KEY_PATH: '/etc/vouch/private.pem',
      JWT_PUBLIC_KEY_PATH: '/etc/vouch/public.pem',
      JWT_ACCESS_TOKEN_DURATION: '5m',
      JWT_REFRESH_TOKEN_DURATION: '30d',
      JWT_ISSUER: 'vouch-test',
      JWT_AUDIENCE: 'api',
      PASSWORD_HASH_ITERATIONS: '200000',
    });

    expect(config).toEqual({
      privateKeyPath: '/etc/vouch/private.pem',
      publicKeyPath: '/etc/vouch/public.pem',
      accessTokenTtl: '5m',
      refreshTokenTtl: '30d',
      issuer: 'vouch-test',
      audience: 'api',
      passwordIterations: 200000,
    });
  });

  it('should name the variable behind a bad duration', () => {
    expect(() => loadAuthConfig({ JWT_ACCESS_TOKEN_DURATION: '15 minutes' })).toThrow(
      /^Invalid auth configuration: JWT_ACCESS_TOKEN_DURATION: /
    );
  });

  it('should reject a low password cost', () => {
    let caught: unknown;
    try {
      loadAuthConfig({ PASSWORD_HASH_ITERATIONS: '10' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof ValidationError ? caught.errors.map((e) => e.field) : []).toEqual([
      'PASSWORD_HASH_ITERATIONS',
    ]);
  });

  it('should reject a non-numeric password cost', () => {
    expect(() => loadAuthConfig({ PASSWORD_HASH_ITERATIONS: 'lots' })).toThrow(
      'Environment variable "PASSWORD_HASH_ITERATIONS" must be an integer, got "lots"'
    );
  });
});
