/**
 * @module
 * Common validation schemas shared across vouch packages.
 *
 * @example
 * ```typescript
 * import { email, duration, errorResponse } from '@vouch/types';
 *
 * const out = duration('15m');
 * ```
 */

import { type } from "arktype";

// ============================================================================
// Primitive Schemas
// ============================================================================

/** ISO 8601 timestamp string */
export const timestamp = type("string.date.iso");

/** Email address validation */
export const email = type("string.email");

/** Non-empty string */
export const nonEmptyString = type("string >= 1");

/** Positive integer */
export const positiveInt = type("number.integer > 0");

/**
 * Duration string: a positive count followed by s, m, h, d or w ("15m", "168h", "7d")
 */
export const duration = type("/^[1-9]\\d*[smhdw]$/");

/** Duration, or "0" to switch a periodic job off */
export const optionalInterval = type("/^(0|[1-9]\\d*[smhdw])$/");

// ============================================================================
// Response Schemas
// ============================================================================

/** Error envelope returned by every failing endpoint */
export const errorResponse = type({
  success: "false",
  error: {
    code: "string",
    message: "string",
    "details?": "object",
  },
});

/** Plain acknowledgement body */
export const messageResponse = type({
  message: "string",
});

// ============================================================================
// Type Exports
// ============================================================================

/** ISO 8601 timestamp string type */
export type Timestamp = typeof timestamp.infer;

/** Valid email address string type */
export type Email = typeof email.infer;

/** Duration string type ("15m", "7d") */
export type Duration = typeof duration.infer;

/** Error envelope type */
export type ErrorResponse = typeof errorResponse.infer;

/** Acknowledgement body type */
export type MessageResponse = typeof messageResponse.infer;
