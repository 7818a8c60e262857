/**
 * =============================================================================
 * MOCK VENUE MODULE - SERVER
 * =============================================================================
 *
 * Standalone mock venue API for local development.
 *
 *   npm run mock:venue
 *   UPSTREAM_USE_MOCK=true npm run dev
 *
 * Prints request statistics on shutdown.
 * =============================================================================
 */

import { config } from '../../config/environment';
import { logger, setLogLabel } from '../../shared/services/logger.service';
import { closeServer, listen } from '../../shared/utils/http-server.utils';
import { MOCK_VENUE_BASE_PATH, MockVenueApi } from './mock-venue.app';

async function main(): Promise<void> {
  setLogLabel('mock-venue');

  const api = new MockVenueApi();
  const { server, port } = await listen(api.app, config.upstream.mockPort, config.host);
  logger.info(`Mock venue API listening on http://${config.host}:${port}${MOCK_VENUE_BASE_PATH}`);

  const shutdown = (signal: string) => {
    logger.info(`${signal} received. Stopping mock venue API...`);
    const stats = api.getStats();
    logger.info('Mock venue API statistics', {
      totalRequests: stats.totalRequests,
      staticRequests: stats.requests.static,
      dynamicRequests: stats.requests.dynamic,
      runningSeconds: Number(stats.runningSeconds.toFixed(1)),
      requestsPerSecond: Number(stats.requestsPerSecond.toFixed(1))
    });

    closeServer(server)
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('Failed to close mock venue API', error);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
  logger.error('Mock venue API failed to start', error);
  process.exit(1);
});
