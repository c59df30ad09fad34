/**
 * @vouch/auth - Password credentials and token sessions
 *
 * RS256 access tokens, rotating refresh tokens and the stores behind them.
 *
 * @example
 * ```typescript
 * import {
 *   createSessionService,
 *   createMemoryStores,
 *   JwtManager,
 *   RefreshTokenManager,
 *   loadAuthConfig,
 *   loadRsaKeyPair,
 * } from '@vouch/auth';
 *
 * const config = loadAuthConfig();
 * const keys = await loadRsaKeyPair(config);
 *
 * const sessions = createSessionService({
 *   ...createMemoryStores(),
 *   jwt: new JwtManager({ keys, accessTokenTtl: config.accessTokenTtl }),
 *   refreshTokenManager: new RefreshTokenManager({ ttl: config.refreshTokenTtl }),
 * });
 *
 * const result = await sessions.login({ email: 'a@x.com', password: 'pw123456' });
 * if (result.success) {
 *   console.log(result.data.accessToken);
 * }
 * ```
 */

// ============================================
// ERRORS
// ============================================

export {
  isAuthFailure,
  JwtError,
  KeyLoadError,
  PasswordHashError,
  type AuthFailure,
  type JwtErrorReason,
} from './errors.js';

// ============================================
// CONFIG
// ============================================

export { loadAuthConfig, AUTH_ENV_VARS, type AuthConfig } from './config.js';

// ============================================
// CORE
// ============================================

export * from './core/index.js';

// ============================================
// SESSION
// ============================================

export * from './session/index.js';

// ============================================
// STORAGE
// ============================================

export * from './storage/index.js';

// ============================================
// UTILITIES
// ============================================

export {
  hashPassword,
  verifyPassword,
  DEFAULT_PBKDF2_ITERATIONS,
  type HashPasswordOptions,
} from './utils/password.js';

export {
  generateAccountId,
  generateRandomHex,
  timingSafeEqualBytes,
  ACCOUNT_ID_ALPHABET,
  ACCOUNT_ID_LENGTH,
} from './utils/crypto.js';

// ============================================
// ADAPTERS
// ============================================

export * from './adapters/index.js';
