/**
 * =============================================================================
 * PRICING MODULE - SCHEMA
 * =============================================================================
 *
 * Zod validation schemas for the delivery order price endpoint.
 * Defines the contract for query parameters and the quote response.
 *
 * All money values are integers in the lowest denomination of the local
 * currency (cents, öre, yen...). Distances are integer meters.
 * =============================================================================
 */

import { z } from 'zod';
import { LATITUDE_RANGE, LONGITUDE_RANGE } from '../../shared/utils/geospatial.utils';

// =============================================================================
// QUERY PARAMETER PRIMITIVES
// =============================================================================

/**
 * Query string holding an integer literal ("1000", "+5", "-3")
 */
const integerParam = (name: string) => z.string()
  .trim()
  .regex(/^[+-]?\d+$/, `${name} must be an integer`)
  .transform(Number);

const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Query string holding a finite decimal number ("60.17", "-1e-3"); no hex or binary literals
 */
const decimalParam = (name: string) => z.string()
  .trim()
  .refine(value => DECIMAL_LITERAL.test(value) && Number.isFinite(Number(value)), `${name} must be a number`)
  .transform(Number);

// =============================================================================
// REQUEST SCHEMAS
// =============================================================================

/**
 * Schema for GET {PRICING_ENDPOINT}?venue_slug=&cart_value=&user_lat=&user_lon=
 */
export const deliveryOrderQuerySchema = z.object({
  venue_slug: z.string().trim().min(1, 'Venue slug must be a non-empty string'),
  cart_value: integerParam('cart_value')
    .pipe(z.number()
      .int()
      .positive('Cart value must be greater than 0')
      .max(Number.MAX_SAFE_INTEGER, `Cart value must not exceed ${Number.MAX_SAFE_INTEGER}`)),
  user_lat: decimalParam('user_lat')
    .pipe(z.number()
      .min(LATITUDE_RANGE.MIN, 'Latitude must be between -90 and 90 degrees')
      .max(LATITUDE_RANGE.MAX, 'Latitude must be between -90 and 90 degrees')),
  user_lon: decimalParam('user_lon')
    .pipe(z.number()
      .min(LONGITUDE_RANGE.MIN, 'Longitude must be between -180 and 180 degrees')
      .max(LONGITUDE_RANGE.MAX, 'Longitude must be between -180 and 180 degrees'))
});

export type DeliveryOrderRequest = Readonly<z.infer<typeof deliveryOrderQuerySchema>>;

// =============================================================================
// VENUE PRICING TYPES
// =============================================================================

/**
 * One distance band of a venue's fee table
 * max === 0 marks the open-ended "no delivery at or beyond min" band
 */
export const distanceRangeSchema = z.object({
  min: z.number().int(),
  max: z.number().int(),
  a: z.number().int(),
  b: z.number().int()
});

export const deliveryPricingSchema = z.object({
  base_price: z.number().int(),
  distance_ranges: z.array(distanceRangeSchema)
});

export type DistanceRange = z.infer<typeof distanceRangeSchema>;
export type DeliveryPricing = z.infer<typeof deliveryPricingSchema>;

// =============================================================================
// RESPONSE TYPES
// =============================================================================

/**
 * Price quote returned to clients
 */
export interface DeliveryPriceResponse {
  total_price: number;
  small_order_surcharge: number;
  cart_value: number;
  delivery: {
    fee: number;
    distance: number;
  };
}
