/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates all environment variables at startup.
 * Fails fast if configuration is invalid - better than runtime errors.
 *
 * USAGE:
 * ```typescript
 * // At application startup (server.ts / cluster.ts)
 * validateAndLogEnvironment(); // Exits in production if invalid
 * ```
 *
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
}

const isPort = (v: string): boolean => {
  const n = parseInt(v, 10);
  return !isNaN(n) && n > 0 && n < 65536;
};

const isPositiveInt = (v: string): boolean => /^\d+$/.test(v) && parseInt(v, 10) > 0;

const isBoolean = (v: string): boolean => ['true', 'false'].includes(v.toLowerCase());

const isHttpUrl = (v: string): boolean => {
  try {
    const url = new URL(v);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
};

/**
 * All environment variables with their requirements
 */
export const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // SERVER
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'PORT',
    required: false,
    default: '8000',
    validator: isPort,
    description: 'Public listener port (balancer or single instance)'
  },
  {
    name: 'HOST',
    required: false,
    default: 'localhost',
    description: 'Server host address'
  },
  {
    name: 'PRICING_ENDPOINT',
    required: false,
    default: '/api/v1/delivery-order-price',
    validator: (v) => v.startsWith('/') && v.length > 1,
    description: 'Path of the pricing endpoint'
  },

  // ==========================================================================
  // LOAD BALANCER
  // ==========================================================================
  {
    name: 'USE_BALANCER',
    required: false,
    default: 'false',
    validator: isBoolean,
    description: 'Run the load balancer in front of several pricing instances'
  },
  {
    name: 'BALANCER_MODE',
    required: false,
    default: 'cluster',
    validator: (v) => ['cluster', 'in-process'].includes(v),
    description: 'How the balancer launches pricing instances'
  },
  {
    name: 'BALANCER_INSTANCES',
    required: false,
    default: '3',
    validator: isPositiveInt,
    description: 'Number of pricing instances behind the balancer'
  },
  {
    name: 'BALANCER_INSTANCE_PORT_START',
    required: false,
    default: '8001',
    validator: isPort,
    description: 'Port of the first pricing instance'
  },
  {
    name: 'BALANCER_HEALTH_CHECK_INTERVAL_MS',
    required: false,
    default: '5000',
    validator: isPositiveInt,
    description: 'Interval between instance health probes'
  },
  {
    name: 'BALANCER_REQUEST_TIMEOUT_MS',
    required: false,
    default: '5000',
    validator: isPositiveInt,
    description: 'Timeout for forwarded requests and probes'
  },
  {
    name: 'BALANCER_INSTANCE_STARTUP_TIMEOUT_MS',
    required: false,
    default: '10000',
    validator: isPositiveInt,
    description: 'How long to wait for a worker to start listening'
  },

  // ==========================================================================
  // PRICING INSTANCE
  // ==========================================================================
  {
    name: 'MAX_CONCURRENT_REQUESTS',
    required: false,
    default: '100',
    validator: isPositiveInt,
    description: 'Admission gate capacity per instance'
  },
  {
    name: 'INSTANCE_PORT',
    required: false,
    validator: isPort,
    description: 'Port of a cluster worker (set by the balancer)'
  },

  // ==========================================================================
  // UPSTREAM VENUE API
  // ==========================================================================
  {
    name: 'UPSTREAM_BASE_URL',
    required: false,
    validator: isHttpUrl,
    description: 'Base URL of the venue data API'
  },
  {
    name: 'UPSTREAM_USE_MOCK',
    required: false,
    default: 'false',
    validator: isBoolean,
    description: 'Use the local mock venue API'
  },
  {
    name: 'MOCK_UPSTREAM_BASE_URL',
    required: false,
    validator: isHttpUrl,
    description: 'Base URL of the mock venue API'
  },
  {
    name: 'MOCK_UPSTREAM_PORT',
    required: false,
    default: '10000',
    validator: isPort,
    description: 'Port of the standalone mock venue API'
  },
  {
    name: 'UPSTREAM_POOL_SIZE',
    required: false,
    default: '5',
    validator: isPositiveInt,
    description: 'Connections per upstream pool (static and dynamic)'
  },
  {
    name: 'UPSTREAM_SOCKETS_PER_CONNECTION',
    required: false,
    default: '1',
    validator: isPositiveInt,
    description: 'Keep-alive sockets per pooled connection'
  },
  {
    name: 'UPSTREAM_TIMEOUT_MS',
    required: false,
    default: '30000',
    validator: isPositiveInt,
    description: 'Total timeout for one upstream request'
  },
  {
    name: 'UPSTREAM_HEALTH_CHECK_INTERVAL_MS',
    required: false,
    default: '30000',
    validator: isPositiveInt,
    description: 'Interval between pool health sweeps'
  },
  {
    name: 'UPSTREAM_PROBE_VENUE_SLUG',
    required: false,
    default: 'home-assignment-venue-helsinki',
    validator: (v) => v.trim().length > 0,
    description: 'Venue requested by pool health probes'
  },

  // ==========================================================================
  // LOGGING
  // ==========================================================================
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'info',
    validator: (v) => ['error', 'warn', 'info', 'debug'].includes(v),
    description: 'Logging level'
  }
];

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  loaded: Record<string, string>;
}

/**
 * Validate all environment variables
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    loaded: {}
  };

  const isProduction = env.NODE_ENV === 'production';

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    if (envVar.required && !value) {
      result.valid = false;
      result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      continue;
    }

    const finalValue = value || envVar.default;
    if (!finalValue) continue;

    if (envVar.validator && !envVar.validator(finalValue)) {
      result.valid = false;
      result.errors.push(`Invalid value for ${envVar.name}: "${finalValue}" - ${envVar.description}`);
      continue;
    }

    result.loaded[envVar.name] = finalValue;
  }

  // Production-specific checks
  if (isProduction && env.UPSTREAM_USE_MOCK === 'true') {
    result.warnings.push('UPSTREAM_USE_MOCK is true in production - prices come from the mock venue API');
  }

  // Balancer port layout must not collide with the public port
  if (result.loaded.USE_BALANCER === 'true') {
    const publicPort = parseInt(result.loaded.PORT ?? '8000', 10);
    const first = parseInt(result.loaded.BALANCER_INSTANCE_PORT_START ?? '8001', 10);
    const count = parseInt(result.loaded.BALANCER_INSTANCES ?? '3', 10);
    if (publicPort >= first && publicPort < first + count) {
      result.valid = false;
      result.errors.push(`PORT ${publicPort} overlaps the instance port range ${first}-${first + count - 1}`);
    }
  }

  return result;
}

/**
 * Validate and log results at startup
 * Exits process if validation fails in production
 */
export function validateAndLogEnvironment(): void {
  const result = validateEnvironment();
  const isProduction = process.env.NODE_ENV === 'production';

  result.errors.forEach(error => {
    logger.error(`Environment validation error: ${error}`);
  });

  result.warnings.forEach(warning => {
    logger.warn(`Environment validation warning: ${warning}`);
  });

  if (result.valid) {
    logger.info('Environment validation passed', {
      mode: result.loaded.NODE_ENV,
      balancer: result.loaded.USE_BALANCER,
      mockUpstream: result.loaded.UPSTREAM_USE_MOCK
    });
  }

  if (!result.valid && isProduction) {
    logger.error('Environment validation failed in production. Exiting.');
    process.exit(1);
  }
}
