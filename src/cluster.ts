/**
 * =============================================================================
 * CLUSTER MANAGER - Balancer With Worker Instances
 * =============================================================================
 *
 * Always runs the balancer, whatever USE_BALANCER says:
 * - Primary: load balancer on PORT, forks one worker per pricing instance
 * - Worker:  one pricing instance on the INSTANCE_PORT the primary assigned
 *
 * A worker that crashes is forked again on the same port (crash-loop guard:
 * 5 restarts per minute).
 *
 * COMMAND:
 * - npm run start:cluster (compiled)
 * - npm run dev:cluster   (ts-node)
 * =============================================================================
 */

import cluster from 'cluster';
import { validateAndLogEnvironment } from './core/config/env.validation';
import { runBalancer, runInstanceWorker } from './bootstrap';
import { logger } from './shared/services/logger.service';

validateAndLogEnvironment();

const role = cluster.isPrimary ? runBalancer('cluster') : runInstanceWorker();

role.catch((error) => {
  logger.error(`${cluster.isPrimary ? 'Primary' : 'Worker'} process ${process.pid} failed`, error);
  process.exit(1);
});
