/**
 * @vouch/server - Expired Token Sweep
 * Periodically deletes refresh tokens past their expiry
 */

import { logError, type Logger } from "@vouch/core";
import type { SessionService } from "@vouch/auth";

export interface TokenSweepOptions {
  sessions: Pick<SessionService, "purgeExpiredTokens">;
  /** Period in milliseconds; 0 disables the sweep */
  intervalMs: number;
  logger: Logger;
}

/**
 * Start the sweep and return a function that stops it.
 * A run still in flight when the next tick fires is not overlapped.
 */
export function startTokenSweep(options: TokenSweepOptions): () => void {
  const { sessions, intervalMs, logger } = options;

  if (intervalMs <= 0) {
    logger.info("Expired token sweep disabled");
    return () => {};
  }

  let running = false;

  const sweep = async (): Promise<void> => {
    if (running) return;
    running = true;
    try {
      const result = await sessions.purgeExpiredTokens();
      if (!result.success) {
        logger.warn("Expired token sweep failed", { code: result.error.code });
      }
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    sweep().catch((error: unknown) => logError(logger, error, "Expired token sweep failed"));
  }, intervalMs);

  logger.info("Expired token sweep started", { intervalMs });

  return () => {
    clearInterval(timer);
  };
}
