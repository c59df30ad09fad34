/**
 * @vouch/server - Health Check Endpoints
 * Liveness and readiness probes
 */

import { Hono } from "hono";
import type { HonoApp, ServerEnv } from "./context.js";

/**
 * Health check status
 */
export type HealthStatus = "healthy" | "unhealthy";

/**
 * Health check result
 */
export interface HealthCheckResult {
  status: HealthStatus;
  message?: string;
  latency?: number;
}

/**
 * Health check function. A rejection counts as unhealthy.
 */
export type HealthCheck = () => Promise<HealthCheckResult> | HealthCheckResult;

/**
 * Health check options
 */
export interface HealthCheckOptions {
  /** Name reported by GET /health */
  service: string;
  /** Checks behind GET /health/ready */
  checks?: Record<string, HealthCheck>;
}

/**
 * Readiness check from a ping function, e.g. PostgresAdapter.ping
 */
export function pingCheck(ping: () => Promise<boolean>): HealthCheck {
  return async () => {
    const start = Date.now();
    const ok = await ping();
    return ok
      ? { status: "healthy", latency: Date.now() - start }
      : { status: "unhealthy", message: "ping failed", latency: Date.now() - start };
  };
}

async function runCheck(check: HealthCheck): Promise<HealthCheckResult> {
  try {
    return await check();
  } catch (err) {
    return {
      status: "unhealthy",
      message: err instanceof Error ? err.message : "Check failed",
    };
  }
}

/**
 * Create health check router
 *
 * @example
 * ```typescript
 * app.route('/health', createHealthRouter({
 *   service: 'vouch',
 *   checks: { database: pingCheck(() => db.ping()) },
 * }));
 * // GET /health       - liveness
 * // GET /health/ready - readiness
 * ```
 */
export function createHealthRouter(options: HealthCheckOptions): HonoApp {
  const router = new Hono<ServerEnv>();
  const { service, checks = {} } = options;

  /**
   * GET /health - Liveness probe
   */
  router.get("/", (c) => {
    return c.json({ status: "ok", service });
  });

  /**
   * GET /health/ready - Readiness probe
   * 503 when any check is unhealthy
   */
  router.get("/ready", async (c) => {
    const entries = await Promise.all(
      Object.entries(checks).map(async ([name, check]) => [name, await runCheck(check)] as const)
    );
    const results = Object.fromEntries(entries);
    const ready = entries.every(([, result]) => result.status === "healthy");

    return c.json({ status: ready ? "ready" : "not_ready", checks: results }, ready ? 200 : 503);
  });

  return router;
}
