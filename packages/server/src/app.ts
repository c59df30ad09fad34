/**
 * @vouch/server - App Factory
 * Assemble the HTTP surface: middleware, health, key set and auth routes
 */

import { Hono } from "hono";
import { createLogger, type Logger } from "@vouch/core";
import {
  createAuthRoutes,
  createJwksHandler,
  type AuthEnv,
  type SessionService,
} from "@vouch/auth";
import type { CorsConfig, HonoApp, ServerEnv } from "./context.js";
import { generateRequestId } from "./context.js";
import { cors } from "./middleware/cors.js";
import { errorHandler, notFoundHandler } from "./middleware/error-handler.js";
import { requestLogger } from "./middleware/request-logger.js";
import { createHealthRouter, type HealthCheck } from "./health.js";

/** Service name reported by /health */
export const SERVICE_NAME = "vouch";

/**
 * App options
 */
export interface CreateAppOptions {
  /** Session service behind /auth and the key set */
  sessions: SessionService;
  /** Base logger; each request gets a child with its request ID */
  logger?: Logger;
  /** CORS configuration (default: any origin) */
  cors?: Partial<CorsConfig>;
  /** Readiness checks for /health/ready */
  readinessChecks?: Record<string, HealthCheck>;
  /** Include stack traces in 500 bodies */
  includeStack?: boolean;
  /** Enable request logging (default: true) */
  logging?: boolean;
}

/**
 * Create the vouch HTTP app
 *
 * @example
 * ```typescript
 * const app = createApp({ sessions, logger, cors: { origin: '*' } });
 * serve({ fetch: app.fetch, port: 3000 });
 * ```
 */
export function createApp(options: CreateAppOptions): HonoApp {
  const app = new Hono<ServerEnv>();
  const logger = options.logger ?? createLogger({ name: "vouch-server" });

  // Initialize context for all requests
  app.use("*", async (c, next) => {
    const requestId = c.req.header("x-request-id") ?? generateRequestId();
    c.set("requestId", requestId);
    c.set("logger", logger.child({ requestId }));
    c.header("x-request-id", requestId);
    await next();
  });

  app.use("*", cors(options.cors));

  if (options.logging !== false) {
    app.use("*", requestLogger({ skip: (c) => c.req.path.startsWith("/health") }));
  }

  app.onError(errorHandler({ logger, includeStack: options.includeStack ?? false }));
  app.notFound(notFoundHandler);

  app.route(
    "/health",
    createHealthRouter({ service: SERVICE_NAME, checks: options.readinessChecks ?? {} })
  );
  app.get("/.well-known/jwks.json", createJwksHandler({ sessions: options.sessions }));
  app.route("/auth", createAuthRoutes(new Hono<AuthEnv>(), { sessions: options.sessions }));

  return app;
}
