/**
 * Process lifecycle helpers
 */

import { createLogger } from './logger';

const logger = createLogger('production');

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

export interface ShutdownOptions {
  /** Force exit when shutdown hangs. Default: 30000 */
  timeoutMs?: number;
}

/**
 * Setup graceful shutdown handlers for SIGTERM, SIGINT, uncaughtException,
 * and unhandledRejection.
 *
 * @param shutdownFn - Stops the loops and closes the database. Called exactly
 *                     once even if multiple signals arrive.
 */
export function setupShutdownHandlers(shutdownFn: () => Promise<void>, options: ShutdownOptions = {}): void {
  const timeoutMs = options.timeoutMs ?? 30_000;
  let isShuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress, ignoring duplicate signal');
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, 'Starting graceful shutdown');

    // Force exit if the in-flight ticks never settle
    const forceTimer = setTimeout(() => {
      logger.error({ timeoutMs }, 'Shutdown timeout - forcing exit');
      process.exit(1);
    }, timeoutMs);
    forceTimer.unref();

    try {
      await shutdownFn();
      clearTimeout(forceTimer);
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (err) {
      clearTimeout(forceTimer);
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', (err) => {
    logger.fatal({ err }, 'Uncaught exception - shutting down');
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    const err = reason instanceof Error ? reason : new Error(String(reason));
    logger.error({ err }, 'Unhandled rejection');
  });
}
