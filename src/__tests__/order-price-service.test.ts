/**
 * =============================================================================
 * ORDER PRICE SERVICE - Integration Tests
 * =============================================================================
 *
 * Full pipeline against the in-process mock venue over real pooled
 * HTTP connections.
 * =============================================================================
 */

jest.mock('../shared/services/logger.service', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() }
}));

import { ErrorCode } from '../core/constants';
import { OrderPriceService } from '../modules/pricing/pricing.service';
import { AdmissionGate } from '../shared/resilience/admission-gate';
import { UpstreamConnectionPool } from '../shared/upstream/connection-pool';
import { httpConnectionFactory } from '../shared/upstream/upstream-connection';
import { RunningMockVenue, priceQuery, startMockVenue, unusedPort, TEST_HOST, TEST_VENUE_SLUG } from './helpers/test-utils';

// =============================================================================
// SETUP
// =============================================================================

interface Pipeline {
  service: OrderPriceService;
  gate: AdmissionGate;
  pool: UpstreamConnectionPool;
}

function createPipeline(baseUrl: string, timeoutMs = 2000): Pipeline {
  const pool = new UpstreamConnectionPool({
    size: 2,
    healthCheckIntervalMs: 60000,
    probeVenueSlug: TEST_VENUE_SLUG,
    connectionFactory: httpConnectionFactory({ baseUrl, timeoutMs, socketsPerConnection: 1 })
  });
  const gate = new AdmissionGate({ capacity: 4 });
  pool.start();
  return { service: new OrderPriceService(pool, gate), gate, pool };
}

/** Helsinki user locations and their distance to the mock venue */
const KALLIO = { user_lat: '60.18526', user_lon: '24.95083' };      // 1937 m
const KULOSAARI = { user_lat: '60.18785', user_lon: '24.98226' };   // 3407 m

describe('OrderPriceService', () => {
  let venue: RunningMockVenue;
  let pipeline: Pipeline;

  beforeAll(async () => {
    venue = await startMockVenue();
  });

  afterAll(async () => {
    await venue.close();
  });

  beforeEach(() => {
    venue.api.reset();
    pipeline = createPipeline(venue.baseUrl);
  });

  afterEach(async () => {
    await pipeline.pool.stop();
  });

  // ===========================================================================
  // QUOTES
  // ===========================================================================

  describe('quote', () => {
    it('prices an order near the venue', async () => {
      const result = await pipeline.service.quote(priceQuery());

      expect(result).toEqual({
        ok: true,
        value: {
          total_price: 1390,
          small_order_surcharge: 0,
          cart_value: 1000,
          delivery: { fee: 390, distance: 64 }
        }
      });
      expect(venue.api.getStats().requests).toEqual({ static: 1, dynamic: 1 });
    });

    it('adds a small order surcharge below the minimum', async () => {
      const result = await pipeline.service.quote(priceQuery({ cart_value: '500' }));

      expect(result.ok && result.value).toEqual({
        total_price: 1390,
        small_order_surcharge: 500,
        cart_value: 500,
        delivery: { fee: 390, distance: 64 }
      });
    });

    it('applies the distance band fee', async () => {
      const result = await pipeline.service.quote(priceQuery(KALLIO));

      expect(result.ok && result.value).toEqual({
        total_price: 1490,
        small_order_surcharge: 0,
        cart_value: 1000,
        delivery: { fee: 490, distance: 1937 }
      });
    });

    it('rejects a distance no band covers', async () => {
      const result = await pipeline.service.quote(priceQuery(KULOSAARI));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.NO_RANGE_FOUND);
        expect(result.error.statusCode).toBe(400);
        expect(result.error.message).toBe('No suitable delivery fee range found for distance 3407m');
        expect(result.error.details).toEqual({ distance: 3407 });
      }
    });

    it('rejects a distance past the open-ended band', async () => {
      venue.api.setPayload('dynamic', {
        venue_raw: {
          delivery_specs: {
            order_minimum_no_surcharge: 1000,
            delivery_pricing: {
              base_price: 390,
              distance_ranges: [
                { min: 0, max: 1000, a: 0, b: 0 },
                { min: 1000, max: 0, a: 0, b: 0 }
              ]
            }
          }
        }
      });

      const result = await pipeline.service.quote(priceQuery(KALLIO));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.DISTANCE_EXCEEDED);
        expect(result.error.message).toBe('Delivery distance 1937m exceeds maximum allowed distance 1000m');
        expect(result.error.details).toEqual({ distance: 1937 });
      }
    });
  });

  // ===========================================================================
  // VALIDATION BEFORE NETWORK
  // ===========================================================================

  describe('invalid queries', () => {
    it('never reaches the venue API', async () => {
      const result = await pipeline.service.quote(priceQuery({ user_lat: '95' }));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.INVALID_INPUT);
      }
      expect(venue.api.getStats().totalRequests).toBe(0);
      expect(pipeline.gate.getStats().admitted).toBe(0);
    });
  });

  // ===========================================================================
  // UPSTREAM FAILURES
  // ===========================================================================

  describe('upstream failures', () => {
    it('stops at a failing static endpoint', async () => {
      venue.api.failWith('static', 500);

      const result = await pipeline.service.quote(priceQuery());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.UPSTREAM_FAILURE);
        expect(result.error.message).toBe('Request failed with status: 500');
      }
      expect(venue.api.getStats().requests).toEqual({ static: 1, dynamic: 0 });
    });

    it('reports an unknown venue', async () => {
      venue.api.failWith('dynamic', 404);

      const result = await pipeline.service.quote(priceQuery());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Request failed with status: 404');
      }
    });

    it('rejects a malformed dynamic payload', async () => {
      venue.api.setPayload('dynamic', { venue_raw: {} });

      const result = await pipeline.service.quote(priceQuery());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.UPSTREAM_DATA_INVALID);
        expect(result.error.message).toBe('Invalid venue dynamic data: venue_raw.delivery_specs: Required');
      }
    });

    it('times out a slow venue API', async () => {
      await pipeline.pool.stop();
      pipeline = createPipeline(venue.baseUrl, 50);
      venue.api.setDelay(200);

      const result = await pipeline.service.quote(priceQuery());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.UPSTREAM_FAILURE);
        expect(result.error.message).toBe('Request timed out');
      }
    });

    it('reports a venue API nobody listens on', async () => {
      await pipeline.pool.stop();
      const port = await unusedPort();
      pipeline = createPipeline(`http://${TEST_HOST}:${port}/home-assignment-api/v1`);

      const result = await pipeline.service.quote(priceQuery());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.UPSTREAM_FAILURE);
        expect(result.error.message).toMatch(/^Request error: /);
      }
    });
  });

  // ===========================================================================
  // ADMISSION
  // ===========================================================================

  describe('admission', () => {
    it('returns every permit once concurrent quotes settle', async () => {
      venue.api.failWith('dynamic', 503);
      const queries = [priceQuery(), priceQuery(KALLIO), priceQuery(), priceQuery(KULOSAARI), priceQuery(), priceQuery()];

      const results = await Promise.all(queries.map(query => pipeline.service.quote(query)));

      expect(results.every(result => !result.ok)).toBe(true);
      expect(pipeline.gate.getStats()).toMatchObject({ active: 0, waiting: 0, admitted: 6, peakActive: 4 });
    });
  });
});
