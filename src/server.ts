/**
 * =============================================================================
 * DOPC - MAIN SERVER
 * =============================================================================
 *
 * Delivery Order Price Calculator.
 *
 * RUN MODES (chosen by configuration):
 * ┌──────────────────────┬──────────────────────────────────────────────────┐
 * │ USE_BALANCER=false   │ one pricing instance on PORT                     │
 * │ USE_BALANCER=true    │ balancer on PORT + BALANCER_INSTANCES instances  │
 * │   BALANCER_MODE=     │   cluster    → one worker process per instance   │
 * │                      │   in-process → instances inside this process     │
 * └──────────────────────┴──────────────────────────────────────────────────┘
 *
 * COMMAND:
 * - npm run dev        (ts-node, configuration from .env)
 * - npm start          (compiled)
 * =============================================================================
 */

import cluster from 'cluster';
import { config } from './config/environment';
import { validateAndLogEnvironment } from './core/config/env.validation';
import { runBalancer, runInstanceWorker, runSingleInstance } from './bootstrap';
import { logger } from './shared/services/logger.service';

// =============================================================================
// ENVIRONMENT VALIDATION (Fail fast if config is invalid)
// =============================================================================
validateAndLogEnvironment();

function run(): Promise<void> {
  if (cluster.isWorker) {
    return runInstanceWorker();
  }
  if (config.balancer.enabled) {
    return runBalancer(config.balancer.mode);
  }
  return runSingleInstance();
}

run().catch((error) => {
  logger.error('Startup failed', error);
  process.exit(1);
});
