/**
 * @vouch/server - Request Logger Middleware
 * One structured line per request
 */

import type { HonoContext, HonoNext } from "../context.js";

/**
 * Request logger options
 */
export interface RequestLoggerOptions {
  /** Skip logging for certain paths */
  skip?: (c: HonoContext) => boolean;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * Request logger middleware
 *
 * @example
 * ```typescript
 * app.use('*', requestLogger({
 *   skip: (c) => c.req.path === '/health',
 * }));
 * ```
 */
export function requestLogger(options: RequestLoggerOptions = {}) {
  const { skip, now = Date.now } = options;

  return async (c: HonoContext, next: HonoNext) => {
    if (skip?.(c)) {
      return next();
    }

    const start = now();
    const logger = c.get("logger");
    const method = c.req.method;
    const path = c.req.path;

    // The context logger already carries the request ID
    logger.debug("Request started", {
      method,
      path,
      userAgent: c.req.header("user-agent"),
    });

    await next();

    const status = c.res.status;
    const logData = {
      method,
      path,
      status,
      durationMs: now() - start,
    };

    // Use appropriate log level
    if (status >= 500) {
      logger.error("Request completed", logData);
    } else if (status >= 400) {
      logger.warn("Request completed", logData);
    } else {
      logger.info("Request completed", logData);
    }
  };
}
