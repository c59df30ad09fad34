/**
 * @vouch/auth - Errors
 * Internal failure causes and the closed set of failures the session service returns
 */

import {
  AccountAlreadyExistsError,
  AccountNotFoundError,
  InternalError,
  InvalidCredentialsError,
  InvalidTokenError,
  TokenExpiredError,
  TokenRevokedError,
  UnauthorizedError,
} from '@vouch/core';

/**
 * Every failure a session operation can return. Nothing else crosses the
 * service boundary; anything unexpected becomes an InternalError.
 */
export type AuthFailure =
  | AccountNotFoundError
  | AccountAlreadyExistsError
  | InvalidCredentialsError
  | InvalidTokenError
  | TokenExpiredError
  | TokenRevokedError
  | UnauthorizedError
  | InternalError;

/**
 * Check whether a value belongs to the AuthFailure union
 */
export function isAuthFailure(error: unknown): error is AuthFailure {
  return (
    error instanceof AccountNotFoundError ||
    error instanceof AccountAlreadyExistsError ||
    error instanceof InvalidCredentialsError ||
    error instanceof InvalidTokenError ||
    error instanceof TokenExpiredError ||
    error instanceof TokenRevokedError ||
    error instanceof UnauthorizedError ||
    error instanceof InternalError
  );
}

/**
 * Why an access token was rejected. Logged, never sent to clients.
 */
export type JwtErrorReason =
  | 'MALFORMED'
  | 'SIGNATURE_MISMATCH'
  | 'ALGORITHM_MISMATCH'
  | 'EXPIRED'
  | 'NOT_YET_VALID'
  | 'INVALID_CLAIMS';

/**
 * JWT Error class
 */
export class JwtError extends Error {
  constructor(
    message: string,
    public readonly reason: JwtErrorReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'JwtError';
  }
}

/**
 * Signing keys could not be read, parsed or paired
 */
export class KeyLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KeyLoadError';
  }
}

/**
 * A stored password hash is not in a format this service writes
 */
export class PasswordHashError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PasswordHashError';
  }
}
