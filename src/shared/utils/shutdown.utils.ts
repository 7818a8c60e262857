/**
 * =============================================================================
 * PROCESS LIFECYCLE
 * =============================================================================
 *
 * Signal handling shared by every entry point:
 * - SIGTERM / SIGINT run the component's stop() once, then exit 0
 * - A stop() that hangs is cut off after FORCE_EXIT_MS (exit 1)
 * - Uncaught exceptions and unhandled rejections are logged and fatal
 * =============================================================================
 */

import { logger } from '../services/logger.service';

const FORCE_EXIT_MS = 30000;

/**
 * Returns the shutdown trigger for callers with other shutdown sources (cluster messages)
 */
export function installShutdownHandlers(name: string, stop: () => Promise<void>): (reason: string) => void {
  let shuttingDown = false;

  const gracefulShutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received. Shutting down ${name}...`);

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, FORCE_EXIT_MS).unref();

    stop()
      .then(() => {
        logger.info('Graceful shutdown complete');
        process.exit(0);
      })
      .catch(error => {
        logger.error('Error during shutdown', error);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    process.exit(1);
  });

  return gracefulShutdown;
}
