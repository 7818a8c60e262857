/**
 * Environment validation
 */

jest.mock('../shared/services/logger.service', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() }
}));

import { validateEnvironment } from '../core/config/env.validation';

describe('validateEnvironment', () => {
  it('accepts an empty environment and loads the defaults', () => {
    const result = validateEnvironment({});

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.loaded).toMatchObject({
      NODE_ENV: 'development',
      PORT: '8000',
      USE_BALANCER: 'false',
      BALANCER_INSTANCES: '3',
      BALANCER_INSTANCE_PORT_START: '8001',
      UPSTREAM_POOL_SIZE: '5',
      UPSTREAM_PROBE_VENUE_SLUG: 'home-assignment-venue-helsinki'
    });
    expect(result.loaded.INSTANCE_PORT).toBeUndefined();
  });

  it('reports a malformed port', () => {
    const result = validateEnvironment({ PORT: 'abc' });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Invalid value for PORT: "abc" - Public listener port (balancer or single instance)'
    ]);
  });

  it('reports a zero pool size and a non-http base URL', () => {
    const result = validateEnvironment({ UPSTREAM_POOL_SIZE: '0', UPSTREAM_BASE_URL: 'ftp://venues' });

    expect(result.errors).toEqual([
      'Invalid value for UPSTREAM_BASE_URL: "ftp://venues" - Base URL of the venue data API',
      'Invalid value for UPSTREAM_POOL_SIZE: "0" - Connections per upstream pool (static and dynamic)'
    ]);
  });

  it('rejects an unknown balancer mode', () => {
    const result = validateEnvironment({ BALANCER_MODE: 'threads' });

    expect(result.errors).toEqual([
      'Invalid value for BALANCER_MODE: "threads" - How the balancer launches pricing instances'
    ]);
  });

  it('rejects a public port inside the instance range', () => {
    const result = validateEnvironment({ USE_BALANCER: 'true', PORT: '8002' });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['PORT 8002 overlaps the instance port range 8001-8003']);
  });

  it('ignores the port layout when the balancer is off', () => {
    expect(validateEnvironment({ USE_BALANCER: 'false', PORT: '8002' }).valid).toBe(true);
  });

  it('warns about the mock venue API in production', () => {
    const result = validateEnvironment({ NODE_ENV: 'production', UPSTREAM_USE_MOCK: 'true' });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'UPSTREAM_USE_MOCK is true in production - prices come from the mock venue API'
    ]);
  });
});
