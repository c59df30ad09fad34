/**
 * @module
 * Error classes for vouch.
 * Every error carries a stable code and the HTTP status it maps to.
 *
 * @example
 * ```typescript
 * import { AccountNotFoundError, InvalidCredentialsError } from '@vouch/core';
 *
 * throw new AccountNotFoundError();
 * throw new InvalidCredentialsError();
 * ```
 */

import { ErrorCodes } from "./error-codes.js";

/** Options accepted by every error constructor */
export interface VouchErrorOptions {
  /** Underlying failure, kept for logs and never serialized */
  cause?: unknown;
}

/**
 * Base error class for all vouch errors.
 * Includes error code, HTTP status code, and optional details.
 *
 * @example
 * ```typescript
 * throw new VouchError('Something went wrong', 'CUSTOM_ERROR', 500, { extra: 'info' });
 * ```
 */
export class VouchError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>,
    options?: VouchErrorOptions
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "VouchError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details ?? undefined;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    statusCode: number;
    details: Record<string, unknown> | undefined;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

/**
 * Check whether a value is a vouch error
 */
export function isVouchError(error: unknown): error is VouchError {
  return error instanceof VouchError;
}

// ============================================
// AUTH ERRORS
// ============================================

/** Base class for authentication-related errors (HTTP 401) */
export class AuthError extends VouchError {
  constructor(
    message: string,
    code: string = ErrorCodes.AUTH_ERROR.code,
    statusCode: number = ErrorCodes.AUTH_ERROR.status,
    details?: Record<string, unknown>,
    options?: VouchErrorOptions
  ) {
    super(message, code, statusCode, details, options);
    this.name = "AuthError";
  }
}

/** Request carries no usable credentials (HTTP 401) */
export class UnauthorizedError extends AuthError {
  constructor(message: string = "Unauthorized", details?: Record<string, unknown>) {
    super(message, ErrorCodes.UNAUTHORIZED.code, ErrorCodes.UNAUTHORIZED.status, details);
    this.name = "UnauthorizedError";
  }
}

/**
 * Email/password pair did not authenticate (HTTP 401).
 * Raised for an unknown account and for a wrong password alike.
 */
export class InvalidCredentialsError extends AuthError {
  constructor(message: string = "Invalid email or password", details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_CREDENTIALS.code, ErrorCodes.INVALID_CREDENTIALS.status, details);
    this.name = "InvalidCredentialsError";
  }
}

/** Token is unknown, malformed, or failed signature/claim checks (HTTP 401) */
export class InvalidTokenError extends AuthError {
  constructor(
    message: string = "Invalid token",
    details?: Record<string, unknown>,
    options?: VouchErrorOptions
  ) {
    super(message, ErrorCodes.TOKEN_INVALID.code, ErrorCodes.TOKEN_INVALID.status, details, options);
    this.name = "InvalidTokenError";
  }
}

/** Token was valid once but its lifetime has passed (HTTP 401) */
export class TokenExpiredError extends AuthError {
  constructor(message: string = "Token expired", details?: Record<string, unknown>) {
    super(message, ErrorCodes.TOKEN_EXPIRED.code, ErrorCodes.TOKEN_EXPIRED.status, details);
    this.name = "TokenExpiredError";
  }
}

/** Token was explicitly revoked: logout, logout-all, or rotation (HTTP 401) */
export class TokenRevokedError extends AuthError {
  constructor(message: string = "Token revoked", details?: Record<string, unknown>) {
    super(message, ErrorCodes.TOKEN_REVOKED.code, ErrorCodes.TOKEN_REVOKED.status, details);
    this.name = "TokenRevokedError";
  }
}

// ============================================
// VALIDATION ERRORS
// ============================================

/** Details about a single validation error */
export interface ValidationErrorDetail {
  /** Field path that failed validation */
  field: string;
  /** Human-readable error message */
  message: string;
}

/** Request validation failed with one or more field errors (HTTP 400) */
export class ValidationError extends VouchError {
  constructor(
    message: string = "Validation failed",
    public readonly errors: ValidationErrorDetail[] = [],
    details?: Record<string, unknown>
  ) {
    super(message, ErrorCodes.VALIDATION_ERROR.code, ErrorCodes.VALIDATION_ERROR.status, {
      ...details,
      fields: Object.fromEntries(errors.map((e) => [e.field, e.message])),
    });
    this.name = "ValidationError";
  }
}

// ============================================
// NOT FOUND ERRORS
// ============================================

/** Requested resource was not found (HTTP 404) */
export class NotFoundError extends VouchError {
  constructor(
    resource: string = "Resource",
    message?: string,
    details?: Record<string, unknown>,
    code: string = ErrorCodes.NOT_FOUND.code
  ) {
    super(message ?? `${resource} not found`, code, ErrorCodes.NOT_FOUND.status, { ...details, resource });
    this.name = "NotFoundError";
  }
}

/** No live account matches the identifier (HTTP 404) */
export class AccountNotFoundError extends NotFoundError {
  constructor(message: string = "Account not found", details?: Record<string, unknown>) {
    super("Account", message, details, ErrorCodes.ACCOUNT_NOT_FOUND.code);
    this.name = "AccountNotFoundError";
  }
}

// ============================================
// CONFLICT ERRORS
// ============================================

/** Resource conflict, such as duplicate entry (HTTP 409) */
export class ConflictError extends VouchError {
  constructor(
    message: string = "Conflict",
    details?: Record<string, unknown>,
    code: string = ErrorCodes.CONFLICT.code
  ) {
    super(message, code, ErrorCodes.CONFLICT.status, details);
    this.name = "ConflictError";
  }
}

/** Registration collided with an existing email (HTTP 409) */
export class AccountAlreadyExistsError extends ConflictError {
  constructor(message: string = "Account already exists", details?: Record<string, unknown>) {
    super(message, details, ErrorCodes.ACCOUNT_ALREADY_EXISTS.code);
    this.name = "AccountAlreadyExistsError";
  }
}

// ============================================
// INTERNAL ERRORS
// ============================================

/**
 * Unexpected failure: storage, I/O, crypto, corrupt stored data (HTTP 500).
 * The cause is logged, never sent to clients.
 */
export class InternalError extends VouchError {
  constructor(
    message: string = "Internal server error",
    options?: VouchErrorOptions,
    details?: Record<string, unknown>
  ) {
    super(message, ErrorCodes.INTERNAL_ERROR.code, ErrorCodes.INTERNAL_ERROR.status, details, options);
    this.name = "InternalError";
  }
}
