/**
 * =============================================================================
 * BOOTSTRAP - Process Roles
 * =============================================================================
 *
 * Every process runs exactly one of these:
 *
 *   runSingleInstance  - one pricing instance on PORT (USE_BALANCER=false)
 *   runBalancer        - the balancer on PORT, instances on
 *                        BALANCER_INSTANCE_PORT_START.. (USE_BALANCER=true)
 *   runInstanceWorker  - a cluster worker serving INSTANCE_PORT
 *
 * Failing to bind a listener at startup is fatal (exit 1).
 * =============================================================================
 */

import { config, BalancerMode } from './config/environment';
import { createBalancerApp } from './app';
import { createPricingInstanceFromConfig } from './instance';
import { LoadBalancer } from './modules/balancer/load-balancer';
import {
  ClusterInstanceLauncher,
  InProcessInstanceLauncher,
  InstanceLauncher
} from './modules/balancer/instance-launcher';
import { logger, setLogLabel } from './shared/services/logger.service';
import { installShutdownHandlers } from './shared/utils/shutdown.utils';
import { closeServer, listen } from './shared/utils/http-server.utils';

function printStartupBanner(role: string, port: number): void {
  const rows: Array<[string, string]> = [
    ['Role', role],
    ['Listening', `http://${config.host}:${port}${config.pricingEndpoint}`],
    ['Environment', config.nodeEnv],
    ['Upstream', config.upstream.useMock ? `${config.upstream.baseUrl} (mock)` : config.upstream.baseUrl],
    ['Pool size', `${config.upstream.poolSize} per role, sweep every ${config.upstream.healthCheckIntervalMs}ms`],
    ['Max concurrency', String(config.maxConcurrentRequests)]
  ];
  if (config.balancer.enabled) {
    rows.push(['Instances', `${config.balancer.instances} from port ${config.balancer.instancePortStart} (${config.balancer.mode})`]);
  }

  console.log('');
  console.log('╔════════════════════════════════════════════════════════════════════╗');
  console.log('║   DELIVERY ORDER PRICE CALCULATOR                                  ║');
  console.log('╠════════════════════════════════════════════════════════════════════╣');
  for (const [label, value] of rows) {
    console.log(`║   ${label.padEnd(16)} ${value.padEnd(47)}║`);
  }
  console.log('╚════════════════════════════════════════════════════════════════════╝');
  console.log('');
}

/**
 * One pricing instance on the public port
 */
export async function runSingleInstance(): Promise<void> {
  setLogLabel(`dopc:${config.port}`);
  const instance = createPricingInstanceFromConfig();

  try {
    await instance.start(config.port);
  } catch (error) {
    logger.error(`Failed to start pricing instance on port ${config.port}`, error);
    process.exit(1);
  }

  installShutdownHandlers('pricing instance', () => instance.stop());
  printStartupBanner('single instance', config.port);
}

/**
 * Pricing instance inside a cluster worker
 */
export async function runInstanceWorker(): Promise<void> {
  const port = config.instancePort;
  setLogLabel(`dopc:${port}`);

  if (port <= 0) {
    logger.error('Worker started without INSTANCE_PORT');
    process.exit(1);
  }

  const instance = createPricingInstanceFromConfig();
  try {
    await instance.start(port);
  } catch (error) {
    logger.error(`Failed to start pricing instance on port ${port}`, error);
    process.exit(1);
  }

  const shutdown = installShutdownHandlers('pricing instance', () => instance.stop());
  process.on('message', (message) => {
    if (message === 'shutdown') {
      logger.info(`Worker ${process.pid} received shutdown signal`);
      shutdown('shutdown message');
    }
  });
}

function createLauncher(mode: BalancerMode): InstanceLauncher {
  return mode === 'cluster'
    ? new ClusterInstanceLauncher(config.balancer.instanceStartupTimeoutMs)
    : new InProcessInstanceLauncher(createPricingInstanceFromConfig, config.host);
}

/**
 * Balancer on the public port, owning its instances
 */
export async function runBalancer(mode: BalancerMode): Promise<void> {
  setLogLabel('balancer');

  const balancer = new LoadBalancer({
    host: config.host,
    pricingEndpoint: config.pricingEndpoint,
    instances: config.balancer.instances,
    instancePortStart: config.balancer.instancePortStart,
    healthCheckIntervalMs: config.balancer.healthCheckIntervalMs,
    requestTimeoutMs: config.balancer.requestTimeoutMs,
    launcher: createLauncher(mode)
  });

  try {
    await balancer.start();
  } catch (error) {
    logger.error('Failed to start pricing instances', error);
    process.exit(1);
  }

  const app = createBalancerApp({ pricingEndpoint: config.pricingEndpoint, balancer });
  try {
    const { server } = await listen(app, config.port, config.host);
    installShutdownHandlers('load balancer', async () => {
      await closeServer(server);
      await balancer.stop();
    });
  } catch (error) {
    logger.error(`Failed to bind balancer on port ${config.port}`, error);
    await balancer.stop();
    process.exit(1);
  }

  logger.info(`Load balancer listening on ${config.host}:${config.port}`);
  printStartupBanner(`balancer (${mode})`, config.port);
}
