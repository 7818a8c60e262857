/**
 * =============================================================================
 * PRICING INSTANCE
 * =============================================================================
 *
 * One self-contained pricing backend: its own admission gate, its own
 * upstream connection pool, its own HTTP listener. Nothing is shared between
 * instances, whether they run as cluster workers or inside one process.
 *
 * LIFECYCLE:
 *   start(port) → pool opened, sweep scheduled, listener bound
 *   stop()      → listener closed, sweep cancelled, connections closed
 * =============================================================================
 */

import { Server } from 'http';
import { Express } from 'express';
import { config } from './config/environment';
import { createInstanceApp } from './app';
import { OrderPriceService } from './modules/pricing/pricing.service';
import { AdmissionGate } from './shared/resilience/admission-gate';
import { logger } from './shared/services/logger.service';
import { UpstreamConnectionPool, UpstreamPoolOptions } from './shared/upstream/connection-pool';
import { httpConnectionFactory } from './shared/upstream/upstream-connection';
import { closeServer, listen } from './shared/utils/http-server.utils';

export interface PricingInstanceOptions {
  pricingEndpoint: string;
  maxConcurrentRequests: number;
  pool: UpstreamPoolOptions;
}

export class PricingInstance {
  readonly gate: AdmissionGate;
  readonly pool: UpstreamConnectionPool;
  readonly service: OrderPriceService;
  readonly app: Express;
  private server: Server | null = null;
  private boundPort: number | null = null;

  constructor(options: PricingInstanceOptions) {
    this.gate = new AdmissionGate({ capacity: options.maxConcurrentRequests });
    this.pool = new UpstreamConnectionPool(options.pool);
    this.service = new OrderPriceService(this.pool, this.gate);
    this.app = createInstanceApp({
      pricingEndpoint: options.pricingEndpoint,
      service: this.service,
      gate: this.gate,
      pool: this.pool
    });
  }

  get port(): number | null {
    return this.boundPort;
  }

  /**
   * Open the pool and bind the listener; resolves with the bound port
   */
  async start(port: number, host: string = config.host): Promise<number> {
    if (this.boundPort !== null) return this.boundPort;

    this.pool.start();
    try {
      const listening = await listen(this.app, port, host);
      this.server = listening.server;
      this.boundPort = listening.port;
    } catch (error) {
      await this.pool.stop();
      throw error;
    }

    logger.info(`Pricing instance listening on ${host}:${this.boundPort}`);
    return this.boundPort;
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;

    if (server) {
      await closeServer(server);
    }
    await this.pool.stop();

    if (this.boundPort !== null) {
      logger.info(`Pricing instance on port ${this.boundPort} stopped`);
      this.boundPort = null;
    }
  }
}

/**
 * Instance wired to the real venue API as configured in the environment
 */
export function createPricingInstanceFromConfig(): PricingInstance {
  return new PricingInstance({
    pricingEndpoint: config.pricingEndpoint,
    maxConcurrentRequests: config.maxConcurrentRequests,
    pool: {
      size: config.upstream.poolSize,
      healthCheckIntervalMs: config.upstream.healthCheckIntervalMs,
      probeVenueSlug: config.upstream.probeVenueSlug,
      connectionFactory: httpConnectionFactory({
        baseUrl: config.upstream.baseUrl,
        timeoutMs: config.upstream.timeoutMs,
        socketsPerConnection: config.upstream.socketsPerConnection
      })
    }
  });
}
