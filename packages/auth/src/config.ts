/**
 * Auth configuration
 * Read from the environment once at startup and validated before any key is loaded
 */

import { getEnv, getEnvNumber, ValidationError, type EnvSource } from '@vouch/core';
import { authConfig, formatErrors, type } from '@vouch/types';
import { DEFAULT_ISSUER } from './session/jwt-manager.js';
import { DEFAULT_PBKDF2_ITERATIONS } from './utils/password.js';

export interface AuthConfig {
  privateKeyPath: string;
  publicKeyPath: string;
  /** Duration string, e.g. '15m' */
  accessTokenTtl: string;
  /** Duration string, e.g. '168h' */
  refreshTokenTtl: string;
  issuer: string;
  audience?: string;
  passwordIterations: number;
}

/** Environment variable behind each config field, for error messages */
export const AUTH_ENV_VARS = {
  privateKeyPath: 'JWT_PRIVATE_KEY_PATH',
  publicKeyPath: 'JWT_PUBLIC_KEY_PATH',
  accessTokenTtl: 'JWT_ACCESS_TOKEN_DURATION',
  refreshTokenTtl: 'JWT_REFRESH_TOKEN_DURATION',
  issuer: 'JWT_ISSUER',
  audience: 'JWT_AUDIENCE',
  passwordIterations: 'PASSWORD_HASH_ITERATIONS',
} as const satisfies Record<keyof AuthConfig, string>;

function isAuthField(field: string): field is keyof typeof AUTH_ENV_VARS {
  return Object.hasOwn(AUTH_ENV_VARS, field);
}

function envNameOf(field: string): string {
  return isAuthField(field) ? AUTH_ENV_VARS[field] : field;
}

/**
 * Load auth settings from environment variables.
 * Throws ValidationError naming the offending variables.
 */
export function loadAuthConfig(source: EnvSource = process.env): AuthConfig {
  const audience = getEnv('JWT_AUDIENCE', undefined, source);
  const input = {
    privateKeyPath: getEnv('JWT_PRIVATE_KEY_PATH', './keys/private_key.pem', source),
    publicKeyPath: getEnv('JWT_PUBLIC_KEY_PATH', './keys/public_key.pem', source),
    accessTokenTtl: getEnv('JWT_ACCESS_TOKEN_DURATION', '15m', source),
    refreshTokenTtl: getEnv('JWT_REFRESH_TOKEN_DURATION', '168h', source),
    issuer: getEnv('JWT_ISSUER', DEFAULT_ISSUER, source),
    ...(audience !== undefined && { audience }),
    passwordIterations: getEnvNumber('PASSWORD_HASH_ITERATIONS', DEFAULT_PBKDF2_ITERATIONS, source),
  };

  const result = authConfig(input);
  if (result instanceof type.errors) {
    const fields = Object.entries(formatErrors(result)).map(([field, message]) => ({
      field: envNameOf(field),
      message,
    }));
    throw new ValidationError(
      `Invalid auth configuration: ${fields.map((f) => `${f.field}: ${f.message}`).join('; ')}`,
      fields
    );
  }

  return result;
}
