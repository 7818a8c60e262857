/**
 * =============================================================================
 * BALANCER MODULE - INSTANCE LAUNCHERS
 * =============================================================================
 *
 * How the balancer brings up its pricing instances.
 *
 * - ClusterInstanceLauncher: one cluster worker process per instance, the
 *   port handed over in INSTANCE_PORT. A worker that crashes is forked again
 *   on the same port, at most MAX_RESTARTS times per RESTART_WINDOW_MS.
 * - InProcessInstanceLauncher: instances live inside the balancer process.
 *   Used by tests and by BALANCER_MODE=in-process.
 * =============================================================================
 */

import cluster, { Worker } from 'cluster';
import { logger } from '../../shared/services/logger.service';
import { PricingInstance } from '../../instance';

const MAX_RESTARTS = 5;
const RESTART_WINDOW_MS = 60000;

/**
 * A running instance as the balancer sees it
 */
export interface LaunchedInstance {
  /** Port the instance actually listens on */
  readonly port: number;
  stop(): Promise<void>;
}

export interface InstanceLauncher {
  readonly mode: string;
  launch(port: number): Promise<LaunchedInstance>;
}

// =============================================================================
// CRASH LOOP GUARD
// =============================================================================

export interface RestartHistory {
  count: number;
  lastRestart: number;
}

/**
 * Decide whether another restart is allowed, updating the history in place
 */
export function shouldRestart(history: RestartHistory, now: number = Date.now()): boolean {
  if (history.count === 0 || now - history.lastRestart > RESTART_WINDOW_MS) {
    history.count = 1;
    history.lastRestart = now;
    return true;
  }

  if (history.count >= MAX_RESTARTS) {
    return false;
  }

  history.count++;
  history.lastRestart = now;
  return true;
}

// =============================================================================
// CLUSTER WORKERS
// =============================================================================

class ClusterInstance implements LaunchedInstance {
  private worker: Worker;
  private stopping = false;
  private readonly restarts: RestartHistory = { count: 0, lastRestart: 0 };

  constructor(
    readonly port: number,
    private readonly startupTimeoutMs: number
  ) {
    this.worker = this.fork();
  }

  /**
   * Resolves once the worker listens, or when the startup timeout runs out
   */
  ready(): Promise<void> {
    const worker = this.worker;

    return new Promise<void>(resolve => {
      const timer = setTimeout(() => {
        worker.off('listening', onListening);
        logger.warn(`Worker for port ${this.port} not listening after ${this.startupTimeoutMs}ms, continuing`);
        resolve();
      }, this.startupTimeoutMs);

      const onListening = () => {
        clearTimeout(timer);
        resolve();
      };
      worker.once('listening', onListening);
    });
  }

  stop(): Promise<void> {
    this.stopping = true;
    const worker = this.worker;
    if (worker.isDead()) return Promise.resolve();

    return new Promise<void>(resolve => {
      const killTimer = setTimeout(() => {
        logger.warn(`Worker ${worker.process.pid} did not disconnect, killing it`);
        worker.kill('SIGKILL');
      }, this.startupTimeoutMs);

      worker.once('exit', () => {
        clearTimeout(killTimer);
        resolve();
      });

      worker.send('shutdown');
      worker.disconnect();
    });
  }

  private fork(): Worker {
    const worker = cluster.fork({ INSTANCE_PORT: String(this.port) });
    logger.info(`Worker ${worker.process.pid} started for port ${this.port}`);

    worker.on('exit', (code, signal) => {
      if (this.stopping) return;

      const exitReason = signal ? `signal ${signal}` : `code ${code}`;
      logger.warn(`Worker ${worker.process.pid} on port ${this.port} died (${exitReason})`);

      if (shouldRestart(this.restarts)) {
        logger.info(`Starting a new worker on port ${this.port}...`);
        this.worker = this.fork();
      } else {
        logger.error(`Worker on port ${this.port} exceeded restart limit. Not restarting.`);
      }
    });

    return worker;
  }
}

export class ClusterInstanceLauncher implements InstanceLauncher {
  readonly mode = 'cluster';

  constructor(private readonly startupTimeoutMs: number) {
    if (!cluster.isPrimary) {
      throw new Error('ClusterInstanceLauncher can only run in the primary process');
    }
  }

  async launch(port: number): Promise<LaunchedInstance> {
    const instance = new ClusterInstance(port, this.startupTimeoutMs);
    await instance.ready();
    return instance;
  }
}

// =============================================================================
// IN-PROCESS INSTANCES
// =============================================================================

export class InProcessInstanceLauncher implements InstanceLauncher {
  readonly mode = 'in-process';

  constructor(
    private readonly createInstance: () => PricingInstance,
    private readonly host: string
  ) {}

  async launch(port: number): Promise<LaunchedInstance> {
    const instance = this.createInstance();
    const boundPort = await instance.start(port, this.host);

    return {
      port: boundPort,
      stop: () => instance.stop()
    };
  }
}
