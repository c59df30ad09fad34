/**
 * @vouch/core - Error Code Catalog
 * Every code the service can put on the wire, with its status and category
 */

/**
 * Error category for grouping and filtering
 */
export type ErrorCategory =
  | "auth"
  | "validation"
  | "resource"
  | "server";

/**
 * Error code definition
 */
export interface ErrorCodeDefinition {
  readonly code: string;
  readonly status: number;
  readonly category: ErrorCategory;
}

/**
 * Centralized error code catalog
 */
export const ErrorCodes = {
  // ============================================================================
  // Authentication Errors (401)
  // ============================================================================
  AUTH_ERROR: {
    code: "AUTH_ERROR",
    status: 401,
    category: "auth",
  },
  UNAUTHORIZED: {
    code: "UNAUTHORIZED",
    status: 401,
    category: "auth",
  },
  INVALID_CREDENTIALS: {
    code: "INVALID_CREDENTIALS",
    status: 401,
    category: "auth",
  },
  TOKEN_INVALID: {
    code: "TOKEN_INVALID",
    status: 401,
    category: "auth",
  },
  TOKEN_EXPIRED: {
    code: "TOKEN_EXPIRED",
    status: 401,
    category: "auth",
  },
  TOKEN_REVOKED: {
    code: "TOKEN_REVOKED",
    status: 401,
    category: "auth",
  },

  // ============================================================================
  // Validation Errors (400)
  // ============================================================================
  VALIDATION_ERROR: {
    code: "VALIDATION_ERROR",
    status: 400,
    category: "validation",
  },

  // ============================================================================
  // Resource Errors (404, 409)
  // ============================================================================
  NOT_FOUND: {
    code: "NOT_FOUND",
    status: 404,
    category: "resource",
  },
  ACCOUNT_NOT_FOUND: {
    code: "ACCOUNT_NOT_FOUND",
    status: 404,
    category: "resource",
  },
  CONFLICT: {
    code: "CONFLICT",
    status: 409,
    category: "resource",
  },
  ACCOUNT_ALREADY_EXISTS: {
    code: "ACCOUNT_ALREADY_EXISTS",
    status: 409,
    category: "resource",
  },

  // ============================================================================
  // Server Errors (500)
  // ============================================================================
  INTERNAL_ERROR: {
    code: "INTERNAL_ERROR",
    status: 500,
    category: "server",
  },
} as const satisfies Record<string, ErrorCodeDefinition>;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ErrorCodes;
