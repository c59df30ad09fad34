/**
 * @module
 * Validation schemas for vouch, built on ArkType.
 *
 * @example
 * ```typescript
 * import { type, loginRequest, formatErrors } from '@vouch/types';
 *
 * const body = loginRequest(input);
 * if (body instanceof type.errors) {
 *   console.error(formatErrors(body));
 * }
 * ```
 */

// Re-export ArkType for convenience
export { type, ArkErrors } from "arktype";
export type { Type } from "arktype";

import type { ArkErrors } from "arktype";

/**
 * Format ArkType errors to a field-to-message map.
 * Top-level failures (body is not an object) land under "root".
 *
 * @example
 * ```typescript
 * const result = registerRequest(input);
 * if (result instanceof type.errors) {
 *   const formatted = formatErrors(result);
 *   // { email: "email must be an email address (was \"nope\")" }
 * }
 * ```
 */
export function formatErrors(errors: ArkErrors): Record<string, string> {
  const formatted: Record<string, string> = {};

  for (const error of errors) {
    const path = [...error.path].map(String).join(".") || "root";
    formatted[path] ??= error.message;
  }

  return formatted;
}

export * from "./common.js";
export * from "./auth.js";
export * from "./config.js";
