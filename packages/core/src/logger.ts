/**
 * @module
 * Structured logging with pluggable transports and field redaction.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@vouch/core';
 *
 * const log = createLogger({ name: 'session', level: 'DEBUG' });
 *
 * log.info('Login succeeded', { accountId });
 * log.error('Refresh failed', error, { accountId });
 *
 * // Child logger with context
 * const requestLog = log.child({ requestId: 'abc123' });
 * ```
 */

import { getEnv } from "./env.js";
import { ConsoleTransport } from "./transports/console.js";
import type { LogTransport } from "./transports/types.js";

export { ConsoleTransport, type ConsoleTransportOptions } from "./transports/console.js";
export type { LogTransport } from "./transports/types.js";

/**
 * Log level constants mapping level names to numeric values.
 * Lower values are more verbose; higher values are more severe.
 */
export const LogLevel = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
  SILENT: 100,
} as const;

/** Log level name string literal type (TRACE, DEBUG, INFO, WARN, ERROR, FATAL, SILENT) */
export type LogLevelName = keyof typeof LogLevel;

/** Numeric log level value type */
export type LogLevelValue = (typeof LogLevel)[LogLevelName];

/**
 * Check whether a string names a log level
 */
export function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LogLevel, value);
}

/**
 * Structured error information included in log entries.
 */
export interface ErrorInfo {
  name: string;
  message: string;
  stack: string | undefined;
  /** Code of a coded error (VouchError, DatabaseError, postgres errors) */
  code?: string | undefined;
  /** Summary of the error's cause, one level deep */
  cause?: { name: string; message: string } | undefined;
}

/**
 * Structured log entry passed to transports.
 */
export interface LogEntry {
  level: LogLevelName;
  levelValue: LogLevelValue;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  context: Record<string, unknown> | undefined;
  error: ErrorInfo | undefined;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerConfig {
  /** Minimum log level (default: LOG_LEVEL env or INFO) */
  level: LogLevelName | undefined;
  /** Logger name, emitted as `module` */
  name: string | undefined;
  /** Base context added to all logs */
  context: Record<string, unknown> | undefined;
  /** Custom transports */
  transports: LogTransport[] | undefined;
  /** Pretty print (default: true in development) */
  pretty: boolean | undefined;
  /** Extra fields to redact, dotted paths allowed */
  redact: string[] | undefined;
  /** Timestamp format */
  timestamp: boolean | (() => string) | undefined;
}

/**
 * Fields that never reach a transport in clear text
 */
export const DEFAULT_REDACT_FIELDS = [
  "password",
  "passwordHash",
  "secret",
  "token",
  "accessToken",
  "refreshToken",
  "access_token",
  "refresh_token",
  "authorization",
  "cookie",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Redact sensitive fields from context. Nested objects are copied before
 * a dotted path is rewritten, so the caller's object is never touched.
 */
function redactFields(
  obj: Record<string, unknown>,
  fields: string[]
): Record<string, unknown> {
  const result = { ...obj };
  for (const field of fields) {
    const parts = field.split(".");
    if (parts.length === 1) {
      if (field in result) {
        result[field] = "[REDACTED]";
      }
      continue;
    }

    let current: Record<string, unknown> = result;
    let found = true;
    for (const part of parts.slice(0, -1)) {
      const next = current[part];
      if (!isRecord(next)) {
        found = false;
        break;
      }
      const copy = { ...next };
      current[part] = copy;
      current = copy;
    }
    const lastPart = parts[parts.length - 1];
    if (found && lastPart !== undefined && lastPart in current) {
      current[lastPart] = "[REDACTED]";
    }
  }
  return result;
}

function toErrorInfo(error: Error): ErrorInfo {
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  const cause = error.cause instanceof Error
    ? { name: error.cause.name, message: error.cause.message }
    : undefined;
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    code,
    cause,
  };
}

/**
 * Structured logger with support for multiple transports and redaction.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ name: 'api', level: 'DEBUG' });
 * logger.info('Request received', { path: '/auth/login' });
 * logger.error('Request failed', new Error('boom'), { accountId: '123' });
 * ```
 */
export class Logger {
  private levelName: LogLevelName;
  private level: LogLevelValue;
  private name: string | undefined;
  private context: Record<string, unknown>;
  private transports: LogTransport[];
  private redactFields: string[];
  private timestampFn: () => string;

  constructor(config: Partial<LoggerConfig> = {}) {
    const envLevel = getEnv("LOG_LEVEL")?.toUpperCase();
    this.levelName = config.level ?? (envLevel && isLogLevelName(envLevel) ? envLevel : "INFO");
    this.level = LogLevel[this.levelName];
    this.name = config.name;
    this.context = config.context ?? {};
    this.transports = config.transports ?? [
      new ConsoleTransport(
        config.pretty !== undefined ? { pretty: config.pretty } : {}
      ),
    ];
    this.redactFields = [...new Set([...DEFAULT_REDACT_FIELDS, ...(config.redact ?? [])])];

    if (config.timestamp === false) {
      this.timestampFn = () => "";
    } else if (typeof config.timestamp === "function") {
      this.timestampFn = config.timestamp;
    } else {
      this.timestampFn = () => new Date().toISOString();
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.levelName,
      name: this.name,
      context: { ...this.context, ...context },
      transports: this.transports,
      redact: this.redactFields,
      timestamp: this.timestampFn,
    });
  }

  /**
   * Whether a message at this level would be emitted
   */
  isLevelEnabled(level: LogLevelName): boolean {
    return LogLevel[level] >= this.level;
  }

  private log(
    level: LogLevelName,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    const levelValue = LogLevel[level];
    if (levelValue < this.level) return;

    let finalContext = { ...this.context };
    if (this.name) {
      finalContext["module"] = this.name;
    }
    if (context) {
      finalContext = { ...finalContext, ...context };
    }

    finalContext = redactFields(finalContext, this.redactFields);

    const entry: LogEntry = {
      level,
      levelValue,
      message,
      timestamp: this.timestampFn(),
      context: Object.keys(finalContext).length > 0 ? finalContext : undefined,
      error: error ? toErrorInfo(error) : undefined,
    };

    for (const transport of this.transports) {
      const pending = transport.log(entry);
      if (pending instanceof Promise) {
        pending.catch((transportError: unknown) => {
          console.error(`Log transport "${transport.name}" failed:`, transportError);
        });
      }
    }
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log("TRACE", message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("DEBUG", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("INFO", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log("WARN", message, context);
  }

  /**
   * Log an error message with optional Error object.
   * @param error - Error object, or context when there is none
   * @param context - Additional context when an Error is given
   */
  error(message: string, error?: Error | Record<string, unknown>, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("ERROR", message, context, error);
    } else {
      this.log("ERROR", message, error);
    }
  }

  /**
   * Log a fatal error message (most severe level).
   */
  fatal(message: string, error?: Error | Record<string, unknown>, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("FATAL", message, context, error);
    } else {
      this.log("FATAL", message, error);
    }
  }

  /**
   * Flush every transport that buffers
   */
  async flush(): Promise<void> {
    await Promise.all(this.transports.map((t) => t.flush?.()));
  }
}

/**
 * Create a new Logger instance with the specified configuration.
 */
export function createLogger(config?: Partial<LoggerConfig>): Logger {
  return new Logger(config);
}

/**
 * Log an error that may not be an Error instance.
 *
 * @example
 * ```typescript
 * try {
 *   await store.revoke(token);
 * } catch (error) {
 *   logError(logger, error, 'Revoke failed', { accountId });
 * }
 * ```
 */
export function logError(
  log: Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
): void {
  if (error instanceof Error) {
    log.error(message, error, context);
  } else {
    log.error(message, { error: String(error), ...context });
  }
}

/**
 * Measure and log the execution time of an async operation.
 * Logs completion time on success, or error details on failure.
 *
 * @example
 * ```typescript
 * const applied = await measureTime(logger, 'migrations', () => runMigrations(executor, dir));
 * // Logs: "migrations completed" { operation: 'migrations', durationMs: 45 }
 * ```
 */
export async function measureTime<T>(
  log: Logger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    const duration = Date.now() - start;
    log.info(`${operation} completed`, { operation, durationMs: duration });
    return result;
  } catch (error) {
    const duration = Date.now() - start;
    logError(log, error, `${operation} failed`, { operation, durationMs: duration });
    throw error;
  }
}
