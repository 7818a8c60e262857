/**
 * =============================================================================
 * PRICING QUERY PARSING - Unit Tests
 * =============================================================================
 */

jest.mock('../shared/services/logger.service', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() }
}));

import { ErrorCode } from '../core/constants';
import { parseDeliveryOrderQuery } from '../modules/pricing/pricing.service';
import { priceQuery } from './helpers/test-utils';

function expectInvalid(query: Record<string, unknown>, message: string): void {
  const result = parseDeliveryOrderQuery(query);
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.code).toBe(ErrorCode.INVALID_INPUT);
    expect(result.error.statusCode).toBe(400);
    expect(result.error.message).toBe(message);
  }
}

describe('parseDeliveryOrderQuery', () => {
  // ===========================================================================
  // ACCEPTED
  // ===========================================================================

  it('converts string parameters into a frozen request', () => {
    const result = parseDeliveryOrderQuery(priceQuery());

    expect(result).toEqual({
      ok: true,
      value: {
        venue_slug: 'home-assignment-venue-helsinki',
        cart_value: 1000,
        user_lat: 60.17045,
        user_lon: 24.93147
      }
    });
    if (result.ok) {
      expect(Object.isFrozen(result.value)).toBe(true);
    }
  });

  it('ignores unknown parameters', () => {
    const result = parseDeliveryOrderQuery({ ...priceQuery(), extra: 'yes' });
    expect(result.ok && Object.keys(result.value).sort()).toEqual(
      ['cart_value', 'user_lat', 'user_lon', 'venue_slug']
    );
  });

  it('accepts coordinates on the range limits', () => {
    const result = parseDeliveryOrderQuery(priceQuery({ user_lat: '-90', user_lon: '180' }));
    expect(result.ok).toBe(true);
  });

  // ===========================================================================
  // MISSING
  // ===========================================================================

  it('lists every missing parameter in declaration order', () => {
    const result = parseDeliveryOrderQuery({ venue_slug: 'x' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Missing required parameters: cart_value, user_lat, user_lon');
      expect(result.error.details).toEqual({ missing: ['cart_value', 'user_lat', 'user_lon'] });
    }
  });

  it('treats an empty query as all parameters missing', () => {
    expectInvalid({}, 'Missing required parameters: venue_slug, cart_value, user_lat, user_lon');
  });

  // ===========================================================================
  // MALFORMED
  // ===========================================================================

  it('rejects a blank venue slug', () => {
    expectInvalid(priceQuery({ venue_slug: '   ' }), 'Validation error: venue_slug: Venue slug must be a non-empty string');
  });

  it('rejects a fractional cart value', () => {
    expectInvalid(priceQuery({ cart_value: '10.5' }), 'Validation error: cart_value: cart_value must be an integer');
  });

  it('rejects a zero cart value', () => {
    expectInvalid(priceQuery({ cart_value: '0' }), 'Validation error: cart_value: Cart value must be greater than 0');
  });

  it('rejects a negative cart value', () => {
    expectInvalid(priceQuery({ cart_value: '-5' }), 'Validation error: cart_value: Cart value must be greater than 0');
  });

  it('rejects a cart value beyond the safe integer range', () => {
    expectInvalid(
      priceQuery({ cart_value: '9007199254740993' }),
      'Validation error: cart_value: Cart value must not exceed 9007199254740991'
    );
  });

  it('accepts the largest safe cart value', () => {
    const result = parseDeliveryOrderQuery(priceQuery({ cart_value: '9007199254740991' }));
    expect(result.ok && result.value.cart_value).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('rejects a latitude beyond 90', () => {
    expectInvalid(
      priceQuery({ user_lat: '95' }),
      'Validation error: user_lat: Latitude must be between -90 and 90 degrees'
    );
  });

  it('rejects a longitude beyond 180', () => {
    expectInvalid(
      priceQuery({ user_lon: '-180.5' }),
      'Validation error: user_lon: Longitude must be between -180 and 180 degrees'
    );
  });

  it('rejects a non-numeric longitude', () => {
    expectInvalid(priceQuery({ user_lon: 'abc' }), 'Validation error: user_lon: user_lon must be a number');
  });

  it('rejects hex and binary coordinate literals', () => {
    expectInvalid(priceQuery({ user_lat: '0x3C' }), 'Validation error: user_lat: user_lat must be a number');
    expectInvalid(priceQuery({ user_lon: '0b11000' }), 'Validation error: user_lon: user_lon must be a number');
  });

  it('accepts decimal and exponent coordinate forms', () => {
    const result = parseDeliveryOrderQuery(priceQuery({ user_lat: '6.017045e1', user_lon: '+.5' }));
    expect(result.ok && [result.value.user_lat, result.value.user_lon]).toEqual([60.17045, 0.5]);
  });

  it('rejects an empty latitude', () => {
    expectInvalid(priceQuery({ user_lat: '' }), 'Validation error: user_lat: user_lat must be a number');
  });

  it('rejects a repeated parameter', () => {
    const result = parseDeliveryOrderQuery({ ...priceQuery(), cart_value: ['1000', '2000'] });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message.startsWith('Validation error: cart_value: ')).toBe(true);
    }
  });
});
