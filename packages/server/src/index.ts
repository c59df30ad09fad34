/**
 * @module
 * HTTP server for vouch: the Hono app, its configuration and the
 * expired-token sweep. `main.ts` is the runnable entry point.
 *
 * @example
 * ```typescript
 * import { createApp } from '@vouch/server';
 * import { serve } from '@hono/node-server';
 *
 * const app = createApp({ sessions, logger });
 * serve({ fetch: app.fetch, port: 3000 });
 * ```
 */

// ============================================================================
// App Factory
// ============================================================================

export { createApp, SERVICE_NAME, type CreateAppOptions } from "./app.js";

// ============================================================================
// Context and Types
// ============================================================================

export {
  type CorsConfig,
  type ServerContextVariables,
  type ServerEnv,
  type HonoApp,
  type HonoContext,
  type HonoNext,
  generateRequestId,
} from "./context.js";

// ============================================================================
// Configuration
// ============================================================================

export { loadConfig, loadServerConfig, type AppConfig, type ServerConfig } from "./config.js";

// ============================================================================
// Health and Maintenance
// ============================================================================

export {
  createHealthRouter,
  pingCheck,
  type HealthStatus,
  type HealthCheck,
  type HealthCheckResult,
  type HealthCheckOptions,
} from "./health.js";

export { startTokenSweep, type TokenSweepOptions } from "./sweep.js";

// ============================================================================
// Middleware
// ============================================================================

export * from "./middleware/index.js";
