/**
 * Adapter Types
 * Request auth context and the snake_case wire shapes shared by framework adapters
 */

import type { VouchError } from '@vouch/core';
import type { AccessTokenClaims, AuthResponse, ErrorResponse, SessionListResponse } from '@vouch/types';
import type { IssuedSession, SessionInfo } from '../core/session-service.js';

/**
 * Auth context attached to requests
 */
export interface AuthContext {
  /** Authenticated account ID */
  accountId: string;
  email: string;
  /** Verified access token claims */
  claims: AccessTokenClaims;
}

/**
 * Token pair response body
 */
export function toAuthResponse(session: IssuedSession): AuthResponse {
  return {
    access_token: session.accessToken,
    refresh_token: session.refreshToken,
    token_type: session.tokenType,
    expires_in: session.expiresIn,
    user: {
      id: session.account.id,
      email: session.account.email,
      name: session.account.name,
    },
  };
}

/**
 * Session list response body. Token values are never included.
 */
export function toSessionListResponse(sessions: SessionInfo[]): SessionListResponse {
  return {
    sessions: sessions.map((session) => ({
      id: String(session.id),
      created_at: session.createdAt.toISOString(),
      expires_at: session.expiresAt.toISOString(),
    })),
  };
}

/**
 * Error envelope for a coded error
 */
export function toErrorResponse(error: VouchError): ErrorResponse {
  return {
    success: false,
    error: {
      code: error.code,
      message: error.message,
      ...(error.details && { details: error.details }),
    },
  };
}
