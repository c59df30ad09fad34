/**
 * vouch entry point
 *
 * Loads config and keys, migrates the database, then serves HTTP until
 * SIGINT or SIGTERM.
 */

import { serve } from "@hono/node-server";
import { createLogger, logError, measureTime } from "@vouch/core";
import {
  JwtManager,
  RefreshTokenManager,
  createDrizzleStores,
  createSessionService,
  loadRsaKeyPair,
} from "@vouch/auth";
import {
  MIGRATIONS_DIR,
  buildConnectionString,
  createPostgresAdapter,
  redactConnectionString,
  runMigrations,
} from "@vouch/database";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { pingCheck } from "./health.js";
import { parseCorsOrigin } from "./middleware/cors.js";
import { startTokenSweep } from "./sweep.js";

const logger = createLogger({ name: "vouch" });

async function main(): Promise<void> {
  const config = loadConfig();

  const keys = await loadRsaKeyPair(config.auth);
  logger.info("Signing keys loaded");

  const db = await createPostgresAdapter(config.database);
  logger.info("Database connected", {
    url: redactConnectionString(buildConnectionString(config.database)),
  });

  await measureTime(logger, "migrations", () =>
    runMigrations(db, MIGRATIONS_DIR, { logger })
  );

  const sessions = createSessionService({
    ...createDrizzleStores(db.drizzle()),
    jwt: new JwtManager({
      keys,
      issuer: config.auth.issuer,
      ...(config.auth.audience !== undefined && { audience: config.auth.audience }),
      accessTokenTtl: config.auth.accessTokenTtl,
    }),
    refreshTokenManager: new RefreshTokenManager({ ttl: config.auth.refreshTokenTtl }),
    passwordIterations: config.auth.passwordIterations,
    logger,
  });

  const app = createApp({
    sessions,
    logger,
    cors: { origin: parseCorsOrigin(config.server.corsOrigin) },
    readinessChecks: { database: pingCheck(() => db.ping()) },
    includeStack: config.server.env === "development",
  });

  const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
    logger.info("Server listening", { port: info.port, env: config.server.env });
  });

  const stopSweep = startTokenSweep({
    sessions,
    intervalMs: config.server.tokenCleanupIntervalMs,
    logger,
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });

    stopSweep();
    server.close((closeError) => {
      if (closeError) {
        logError(logger, closeError, "HTTP server close failed");
      }
      db.close().then(
        () => {
          logger.info("Shutdown complete");
          process.exit(closeError ? 1 : 0);
        },
        (error: unknown) => {
          logError(logger, error, "Database close failed");
          process.exit(1);
        }
      );
    });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logError(logger, error, "Startup failed");
  process.exit(1);
});
