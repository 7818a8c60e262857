/**
 * =============================================================================
 * PRICING MODULE - ENGINE
 * =============================================================================
 *
 * Pure price arithmetic: no I/O, no logging, no clock.
 *
 * FEE FORMULA (per matching distance band):
 *   fee = base_price + a + floor(b * distance / 10)
 *
 * Bands are scanned in the order the venue lists them. The first open-ended
 * band (max === 0) whose min is reached rejects the order outright.
 * =============================================================================
 */

import { ErrorCode, PricingRejectionCode, QUOTE_LIMITS } from '../../core/constants';
import { QuoteInvariantError } from '../../core/errors/AppError';
import { Result, err, ok } from '../../core/result';
import { haversineDistanceMeters, isValidLatitude, isValidLongitude } from '../../shared/utils/geospatial.utils';
import { DeliveryPriceResponse, DeliveryPricing } from './pricing.schema';

export type FeeResult =
  | { ok: true; fee: number }
  | { ok: false; reason: PricingRejectionCode; message: string };

/**
 * Distance from user to venue, rounded to the nearest meter
 */
export function distance(userLat: number, userLon: number, venueLat: number, venueLon: number): number {
  return Math.round(haversineDistanceMeters(userLat, userLon, venueLat, venueLon));
}

/**
 * Look up the delivery fee for a distance in the venue's band table
 */
export function deliveryFee(distanceMeters: number, pricing: DeliveryPricing): FeeResult {
  for (const range of pricing.distance_ranges) {
    if (range.max === 0) {
      if (distanceMeters >= range.min) {
        return {
          ok: false,
          reason: ErrorCode.DISTANCE_EXCEEDED,
          message: `Delivery distance ${distanceMeters}m exceeds maximum allowed distance ${range.min}m`
        };
      }
      continue;
    }

    if (range.min <= distanceMeters && distanceMeters <= range.max) {
      return {
        ok: true,
        fee: pricing.base_price + range.a + Math.floor((range.b * distanceMeters) / 10)
      };
    }
  }

  return {
    ok: false,
    reason: ErrorCode.NO_RANGE_FOUND,
    message: `No suitable delivery fee range found for distance ${distanceMeters}m`
  };
}

export function smallOrderSurcharge(cartValue: number, orderMinimum: number): number {
  return Math.max(0, orderMinimum - cartValue);
}

export function totalPrice(cartValue: number, fee: number, surcharge: number): number {
  return cartValue + fee + surcharge;
}

/**
 * Latitude in [-90, 90], longitude in [-180, 180]
 */
export function validateCoordinates(lat: number, lon: number): Result<void, string> {
  if (!isValidLatitude(lat)) {
    return err(`Invalid latitude: ${lat}. Must be between -90 and 90`);
  }
  if (!isValidLongitude(lon)) {
    return err(`Invalid longitude: ${lon}. Must be between -180 and 180`);
  }
  return ok(undefined);
}

/**
 * Assemble a quote, refusing any combination that breaks the response contract
 */
export function buildQuote(
  cartValue: number,
  fee: number,
  distanceMeters: number,
  surcharge: number
): Result<DeliveryPriceResponse, QuoteInvariantError> {
  if (!Number.isSafeInteger(cartValue) || cartValue <= 0) {
    return err(new QuoteInvariantError(`Cart value must be a positive safe integer, got ${cartValue}`));
  }
  if (!Number.isInteger(fee) || fee <= 0 || fee > QUOTE_LIMITS.MAX_DELIVERY_FEE) {
    return err(new QuoteInvariantError(`Delivery fee ${fee} is outside (0, ${QUOTE_LIMITS.MAX_DELIVERY_FEE}]`));
  }
  if (!Number.isInteger(distanceMeters) || distanceMeters <= 0 || distanceMeters > QUOTE_LIMITS.MAX_DISTANCE_METERS) {
    return err(new QuoteInvariantError(
      `Delivery distance ${distanceMeters}m is outside (0, ${QUOTE_LIMITS.MAX_DISTANCE_METERS}]`
    ));
  }
  if (!Number.isSafeInteger(surcharge) || surcharge < 0) {
    return err(new QuoteInvariantError(`Small order surcharge must be a non-negative safe integer, got ${surcharge}`));
  }

  const total = totalPrice(cartValue, fee, surcharge);
  if (!Number.isSafeInteger(total)) {
    return err(new QuoteInvariantError(`Total price ${total} exceeds ${Number.MAX_SAFE_INTEGER}`));
  }

  return ok(Object.freeze({
    total_price: total,
    small_order_surcharge: surcharge,
    cart_value: cartValue,
    delivery: Object.freeze({ fee, distance: distanceMeters })
  }));
}
