/**
 * Session Module
 * Signing keys, access tokens and refresh tokens
 */

// JWT Manager
export {
  JwtManager,
  createJwtManager,
  decodeAccessToken,
  extractBearerToken,
  parseDuration,
  JWT_ALGORITHM,
  DEFAULT_ISSUER,
  type JwtConfig,
  type IssuedAccessToken,
} from './jwt-manager.js';

// Keys
export {
  importRsaKeyPair,
  loadRsaKeyPair,
  MIN_RSA_MODULUS_BITS,
  type RsaKeyPair,
  type RsaKeyPaths,
} from './keys.js';

// Refresh tokens
export {
  RefreshTokenManager,
  createRefreshTokenManager,
  getRefreshTokenState,
  isRefreshTokenValid,
  REFRESH_TOKEN_BYTES,
  type RefreshTokenConfig,
  type IssuedRefreshToken,
  type RefreshTokenState,
  type RefreshTokenStateInput,
} from './refresh-token.js';
