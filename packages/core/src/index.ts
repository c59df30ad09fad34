/**
 * @module
 * Shared foundations for vouch packages: errors, logging, environment access.
 *
 * @example
 * ```typescript
 * import { createLogger, getEnv, InvalidTokenError } from '@vouch/core';
 *
 * const log = createLogger({ name: 'my-service' });
 * log.info('Service started', { port: getEnv('PORT', '3000') });
 * ```
 */

// ============================================
// ENVIRONMENT
// ============================================

export {
  getEnv,
  getEnvNumber,
  isDevelopment,
  getEnvMode,
  type EnvMode,
  type EnvSource,
} from "./env.js";

// ============================================
// LOGGING
// ============================================

export {
  Logger,
  ConsoleTransport,
  LogLevel,
  DEFAULT_REDACT_FIELDS,
  createLogger,
  isLogLevelName,
  logError,
  measureTime,
  type ConsoleTransportOptions,
  type ErrorInfo,
  type LogLevelName,
  type LogLevelValue,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
} from "./logger.js";

// ============================================
// ERRORS
// ============================================

export * from "./errors.js";

// ============================================
// ERROR CODES
// ============================================

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCategory,
  type ErrorCodeDefinition,
} from "./error-codes.js";
