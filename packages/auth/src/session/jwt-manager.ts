/**
 * JWT Manager
 * Signs and verifies RS256 access tokens with jose and publishes the public key as a JWKS
 */

import * as jose from 'jose';
import { type } from 'arktype';
import {
  accessTokenClaims,
  type AccessTokenClaims,
  type JsonWebKeySet,
  type RsaPublicJwk,
} from '@vouch/types';
import { JwtError } from '../errors.js';
import type { RsaKeyPair } from './keys.js';

/**
 * JWT configuration
 */
export interface JwtConfig {
  /** Signing key pair */
  keys: RsaKeyPair;
  /** Token issuer (default: 'auth-service') */
  issuer?: string;
  /** Token audience; checked on verify when set */
  audience?: string;
  /** Access token TTL, as a duration string ('15m') or seconds (default: '15m') */
  accessTokenTtl?: string | number;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * A freshly signed access token
 */
export interface IssuedAccessToken {
  token: string;
  expiresAt: Date;
  /** Lifetime in seconds */
  expiresIn: number;
}

/** Only algorithm ever accepted on verify */
export const JWT_ALGORITHM = 'RS256';

/** Default issuer claim */
export const DEFAULT_ISSUER = 'auth-service';

/**
 * Parse duration string to seconds
 * Supports: s (seconds), m (minutes), h (hours), d (days), w (weeks)
 */
export function parseDuration(duration: string): number {
  const match = duration.match(/^(\d+)(s|m|h|d|w)$/);
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}. Use format like '15m', '1h', '7d'`);
  }

  const value = parseInt(match[1]!, 10);
  const unit = match[2];

  switch (unit) {
    case 's':
      return value;
    case 'm':
      return value * 60;
    case 'h':
      return value * 60 * 60;
    case 'd':
      return value * 60 * 60 * 24;
    case 'w':
      return value * 60 * 60 * 24 * 7;
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }
}

function toSeconds(ttl: string | number): number {
  const seconds = typeof ttl === 'number' ? ttl : parseDuration(ttl);
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new RangeError(`Token lifetime must be a positive whole number of seconds, got ${ttl}`);
  }
  return seconds;
}

/**
 * Translate a jose failure into a JwtError reason
 */
function toJwtError(error: unknown): JwtError {
  if (error instanceof jose.errors.JWTExpired) {
    return new JwtError('Access token expired', 'EXPIRED', { cause: error });
  }
  if (error instanceof jose.errors.JWTClaimValidationFailed) {
    if (error.claim === 'nbf') {
      return new JwtError('Access token not yet valid', 'NOT_YET_VALID', { cause: error });
    }
    return new JwtError(`Access token claim "${error.claim}" rejected`, 'INVALID_CLAIMS', { cause: error });
  }
  if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
    return new JwtError('Access token signature mismatch', 'SIGNATURE_MISMATCH', { cause: error });
  }
  if (error instanceof jose.errors.JOSEAlgNotAllowed || error instanceof jose.errors.JOSENotSupported) {
    return new JwtError('Access token algorithm not accepted', 'ALGORITHM_MISMATCH', { cause: error });
  }
  return new JwtError('Malformed access token', 'MALFORMED', { cause: error });
}

/**
 * JWT Manager
 * Handles access token signing, verification and key publication
 */
export class JwtManager {
  private readonly privateKey: jose.KeyLike;
  private readonly publicKey: jose.KeyLike;
  private readonly issuer: string;
  private readonly audience: string | undefined;
  private readonly ttlSeconds: number;
  private readonly now: () => number;
  private readonly keySet: JsonWebKeySet;

  constructor(config: JwtConfig) {
    this.privateKey = config.keys.privateKey;
    this.publicKey = config.keys.publicKey;
    this.issuer = config.issuer ?? DEFAULT_ISSUER;
    this.audience = config.audience;
    this.ttlSeconds = toSeconds(config.accessTokenTtl ?? '15m');
    this.now = config.now ?? Date.now;

    const jwk = config.keys.publicKey.export({ format: 'jwk' });
    if (jwk.n === undefined || jwk.e === undefined) {
      throw new Error('Public key has no RSA modulus');
    }
    const publicJwk: RsaPublicJwk = { kty: 'RSA', use: 'sig', alg: JWT_ALGORITHM, n: jwk.n, e: jwk.e };
    this.keySet = Object.freeze({ keys: [Object.freeze(publicJwk)] });
  }

  /**
   * Access token lifetime in seconds
   */
  get accessTokenTtl(): number {
    return this.ttlSeconds;
  }

  /**
   * Sign an access token for an account
   */
  async issueAccessToken(accountId: string, email: string): Promise<IssuedAccessToken> {
    const iat = Math.floor(this.now() / 1000);
    const exp = iat + this.ttlSeconds;

    let jwt = new jose.SignJWT({ user_id: accountId, email })
      .setProtectedHeader({ alg: JWT_ALGORITHM, typ: 'JWT' })
      .setSubject(accountId)
      .setIssuer(this.issuer)
      .setIssuedAt(iat)
      .setNotBefore(iat)
      .setExpirationTime(exp);

    if (this.audience) {
      jwt = jwt.setAudience(this.audience);
    }

    const token = await jwt.sign(this.privateKey);

    return { token, expiresAt: new Date(exp * 1000), expiresIn: this.ttlSeconds };
  }

  /**
   * Verify an access token and return its claims.
   * Rejects with JwtError; the reason says which check failed.
   */
  async verifyAccessToken(token: string): Promise<AccessTokenClaims> {
    let payload: jose.JWTPayload;
    try {
      const result = await jose.jwtVerify(token, this.publicKey, {
        algorithms: [JWT_ALGORITHM],
        issuer: this.issuer,
        ...(this.audience ? { audience: this.audience } : {}),
        currentDate: new Date(this.now()),
      });
      payload = result.payload;
    } catch (error) {
      throw toJwtError(error);
    }

    const claims = accessTokenClaims(payload);
    if (claims instanceof type.errors) {
      throw new JwtError(`Access token claims rejected: ${claims.summary}`, 'INVALID_CLAIMS');
    }
    if (claims.sub !== claims.user_id) {
      throw new JwtError('Access token subject does not match user_id', 'INVALID_CLAIMS');
    }

    return claims;
  }

  /**
   * Public key set for /.well-known/jwks.json. The same frozen object on every call.
   */
  getPublicKeySet(): JsonWebKeySet {
    return this.keySet;
  }
}

/**
 * Decode token claims without verification (diagnostics only)
 */
export function decodeAccessToken(token: string): jose.JWTPayload | null {
  try {
    return jose.decodeJwt(token);
  } catch {
    return null;
  }
}

/**
 * Extract token from Authorization header
 */
export function extractBearerToken(
  authHeader: string | null | undefined
): string | null {
  if (!authHeader) return null;
  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0] !== 'Bearer') return null;
  return parts[1] || null;
}

/**
 * Create a JwtManager instance
 */
export function createJwtManager(config: JwtConfig): JwtManager {
  return new JwtManager(config);
}
