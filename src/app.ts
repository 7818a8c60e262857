/**
 * =============================================================================
 * EXPRESS APPLICATION FACTORIES
 * =============================================================================
 *
 * Two apps share one middleware stack:
 *
 *   createInstanceApp  - a pricing instance (pipeline + health)
 *   createBalancerApp  - the balancer (forwarding + health + status)
 *
 * Both are plain factories so tests can mount them on port 0.
 * =============================================================================
 */

import express, { Express, Router } from 'express';
import cors from 'cors';
import compression from 'compression';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { DetailedHealthProvider, createHealthRouter } from './shared/routes/health.routes';
import { createPricingRouter } from './modules/pricing/pricing.routes';
import { OrderPriceService } from './modules/pricing/pricing.service';
import { AdmissionGate } from './shared/resilience/admission-gate';
import { UpstreamConnectionPool } from './shared/upstream/connection-pool';
import { LoadBalancer } from './modules/balancer/load-balancer';
import { createBalancerRouter } from './modules/balancer/balancer.routes';

export interface InstanceAppDeps {
  pricingEndpoint: string;
  service: OrderPriceService;
  gate: AdmissionGate;
  pool: UpstreamConnectionPool;
}

export interface BalancerAppDeps {
  pricingEndpoint: string;
  balancer: LoadBalancer;
}

function buildApp(healthRouter: Router, featureRouter: Router): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(cors());
  app.use(compression());
  app.use(requestLogger);

  app.use(healthRouter);
  app.use(featureRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export function createInstanceApp(deps: InstanceAppDeps): Express {
  const detailed: DetailedHealthProvider = () => ({
    admission: deps.gate.getStats(),
    upstreamPool: deps.pool.getStats()
  });

  return buildApp(
    createHealthRouter('pricing-instance', detailed),
    createPricingRouter(deps.pricingEndpoint, deps.service)
  );
}

export function createBalancerApp(deps: BalancerAppDeps): Express {
  const detailed: DetailedHealthProvider = () => ({
    balancer: deps.balancer.getStatus()
  });

  return buildApp(
    createHealthRouter('balancer', detailed),
    createBalancerRouter(deps.pricingEndpoint, deps.balancer)
  );
}
