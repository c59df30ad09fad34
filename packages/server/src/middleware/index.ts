/**
 * @vouch/server - Middleware
 */

export { cors, parseCorsOrigin } from "./cors.js";
export {
  errorHandler,
  notFoundHandler,
  type ErrorHandlerOptions,
} from "./error-handler.js";
export { requestLogger, type RequestLoggerOptions } from "./request-logger.js";
