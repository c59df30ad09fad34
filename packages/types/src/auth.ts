/**
 * @module
 * Authentication wire schemas: request bodies, token responses, access-token
 * claims and the published key set.
 *
 * @example
 * ```typescript
 * import { registerRequest, type RegisterRequest } from '@vouch/types';
 *
 * const body = registerRequest(await c.req.json());
 * if (body instanceof type.errors) {
 *   // 400
 * }
 * ```
 */

import { type } from "arktype";
import { email, nonEmptyString, positiveInt, timestamp } from "./common.js";

// ============================================================================
// Request Schemas
// ============================================================================

/** POST /auth/register. Passwords shorter than 8 characters are refused. */
export const registerRequest = type({
  email,
  password: "string >= 8",
  name: nonEmptyString,
});

/** POST /auth/login */
export const loginRequest = type({
  email,
  password: nonEmptyString,
});

/** POST /auth/refresh and POST /auth/logout */
export const refreshTokenRequest = type({
  refresh_token: nonEmptyString,
});

// ============================================================================
// Response Schemas
// ============================================================================

/** Public view of an account */
export const accountProfile = type({
  id: "string",
  email: "string",
  name: "string",
});

/** Token pair returned by register, login and refresh */
export const authResponse = type({
  access_token: nonEmptyString,
  refresh_token: nonEmptyString,
  token_type: "'Bearer'",
  expires_in: positiveInt,
  user: accountProfile,
});

/** One active refresh session, without the token value */
export const sessionSummary = type({
  id: "string",
  created_at: timestamp,
  expires_at: timestamp,
});

/** GET /auth/sessions */
export const sessionListResponse = type({
  sessions: sessionSummary.array(),
});

/** POST /auth/logout-all */
export const logoutAllResponse = type({
  message: "string",
  revoked_count: "number.integer >= 0",
});

// ============================================================================
// Token Schemas
// ============================================================================

/** Claims carried by every access token */
export const accessTokenClaims = type({
  user_id: nonEmptyString,
  email: "string",
  iss: "string",
  sub: nonEmptyString,
  iat: "number.integer",
  nbf: "number.integer",
  exp: "number.integer",
  "aud?": "string | string[]",
});

/** RSA public signing key in JWK form */
export const rsaPublicJwk = type({
  kty: "'RSA'",
  use: "'sig'",
  alg: "'RS256'",
  n: nonEmptyString,
  e: nonEmptyString,
});

/** Key set served at /.well-known/jwks.json */
export const jsonWebKeySet = type({
  keys: rsaPublicJwk.array(),
});

// ============================================================================
// Type Exports
// ============================================================================

export type RegisterRequest = typeof registerRequest.infer;
export type LoginRequest = typeof loginRequest.infer;
export type RefreshTokenRequest = typeof refreshTokenRequest.infer;
export type AccountProfile = typeof accountProfile.infer;
export type AuthResponse = typeof authResponse.infer;
export type SessionSummary = typeof sessionSummary.infer;
export type SessionListResponse = typeof sessionListResponse.infer;
export type LogoutAllResponse = typeof logoutAllResponse.infer;
export type AccessTokenClaims = typeof accessTokenClaims.infer;
export type RsaPublicJwk = typeof rsaPublicJwk.infer;
export type JsonWebKeySet = typeof jsonWebKeySet.infer;
