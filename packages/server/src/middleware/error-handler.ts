/**
 * @vouch/server - Error Handling
 * Turns stray exceptions and unknown routes into the standard error body
 */

import type { ErrorHandler, NotFoundHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { InternalError, NotFoundError, VouchError, logError, type Logger } from "@vouch/core";
import { sendError } from "@vouch/auth";
import type { ServerEnv } from "../context.js";

/**
 * Error handler options
 */
export interface ErrorHandlerOptions {
  /** Fallback logger when the request context has none */
  logger: Logger;
  /** Include the stack trace of unexpected errors in the response body */
  includeStack?: boolean;
}

/**
 * Global error handler, for app.onError
 *
 * Coded errors keep their status. Anything else is logged and answered with
 * 500 INTERNAL_ERROR; the thrown message stays in the log.
 *
 * @example
 * ```typescript
 * app.onError(errorHandler({ logger, includeStack: isDevelopment() }));
 * ```
 */
export function errorHandler(options: ErrorHandlerOptions): ErrorHandler<ServerEnv> {
  const { includeStack = false } = options;

  return (err, c) => {
    const logger = c.get("logger") ?? options.logger;
    const requestId = c.get("requestId");

    if (err instanceof VouchError) {
      if (err.statusCode >= 500) {
        logError(logger, err.cause ?? err, "Request error", { requestId, code: err.code });
      }
      return sendError(c, err);
    }

    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    logger.error("Unhandled error", err, {
      requestId,
      method: c.req.method,
      path: c.req.path,
    });

    return sendError(
      c,
      new InternalError(
        "An unexpected error occurred",
        { cause: err },
        includeStack && err.stack ? { stack: err.stack } : undefined
      )
    );
  };
}

/**
 * Not found handler
 *
 * @example
 * ```typescript
 * app.notFound(notFoundHandler);
 * ```
 */
export const notFoundHandler: NotFoundHandler<ServerEnv> = (c) => {
  return sendError(c, new NotFoundError("Route", `Route ${c.req.method} ${c.req.path} not found`));
};
