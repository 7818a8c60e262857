/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * RUN MODES:
 * - USE_BALANCER=false → one pricing instance listens on PORT
 * - USE_BALANCER=true  → the balancer listens on PORT and owns
 *                        BALANCER_INSTANCES pricing instances on consecutive
 *                        ports starting at BALANCER_INSTANCE_PORT_START
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional()/getNumber()/getBoolean() for values with sensible defaults
 * =============================================================================
 */

import dotenv from 'dotenv';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Balancer instance launch strategy
 */
export type BalancerMode = 'cluster' | 'in-process';

function getBalancerMode(): BalancerMode {
  return getOptional('BALANCER_MODE', 'cluster') === 'in-process' ? 'in-process' : 'cluster';
}

const nodeEnv = getOptional('NODE_ENV', 'development');
const useMockUpstream = getBoolean('UPSTREAM_USE_MOCK', false);

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

/**
 * Application configuration object
 * Validated at startup by validateAndLogEnvironment()
 */
export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 8000),
  host: getOptional('HOST', 'localhost'),

  // Public pricing route (same path on the balancer and on every instance)
  pricingEndpoint: getOptional('PRICING_ENDPOINT', '/api/v1/delivery-order-price'),

  // Set by the balancer on each forked worker
  instancePort: getNumber('INSTANCE_PORT', 0),

  // Load balancer
  balancer: {
    enabled: getBoolean('USE_BALANCER', false),
    mode: getBalancerMode(),
    instances: getNumber('BALANCER_INSTANCES', 3),
    instancePortStart: getNumber('BALANCER_INSTANCE_PORT_START', 8001),
    healthCheckIntervalMs: getNumber('BALANCER_HEALTH_CHECK_INTERVAL_MS', 5000),
    requestTimeoutMs: getNumber('BALANCER_REQUEST_TIMEOUT_MS', 5000),
    instanceStartupTimeoutMs: getNumber('BALANCER_INSTANCE_STARTUP_TIMEOUT_MS', 10000),
  },

  // Admission control (per pricing instance)
  maxConcurrentRequests: getNumber('MAX_CONCURRENT_REQUESTS', 100),

  // Upstream venue API
  upstream: {
    useMock: useMockUpstream,
    baseUrl: useMockUpstream
      ? getOptional('MOCK_UPSTREAM_BASE_URL', 'http://localhost:10000/home-assignment-api/v1')
      : getOptional('UPSTREAM_BASE_URL', 'https://consumer-api.development.dev.woltapi.com/home-assignment-api/v1'),
    mockPort: getNumber('MOCK_UPSTREAM_PORT', 10000),
    poolSize: getNumber('UPSTREAM_POOL_SIZE', 5),
    socketsPerConnection: getNumber('UPSTREAM_SOCKETS_PER_CONNECTION', 1),
    timeoutMs: getNumber('UPSTREAM_TIMEOUT_MS', 30000),
    healthCheckIntervalMs: getNumber('UPSTREAM_HEALTH_CHECK_INTERVAL_MS', 30000),
    probeVenueSlug: getOptional('UPSTREAM_PROBE_VENUE_SLUG', 'home-assignment-venue-helsinki'),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'info'),

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',
} as const;

export type AppConfig = typeof config;
