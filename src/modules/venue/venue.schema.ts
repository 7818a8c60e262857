/**
 * =============================================================================
 * VENUE MODULE - SCHEMA
 * =============================================================================
 *
 * Zod schemas for the two payloads the venue API serves. We have no control
 * over that API, so every field we read is checked for presence and type.
 * Anything else in the payload is ignored.
 *
 *   GET /venues/{slug}/static  → venue_raw.location.coordinates = [lon, lat]
 *   GET /venues/{slug}/dynamic → venue_raw.delivery_specs
 * =============================================================================
 */

import { z } from 'zod';
import { deliveryPricingSchema } from '../pricing/pricing.schema';

// =============================================================================
// STATIC DATA
// =============================================================================

/**
 * GeoJSON order: longitude first. Ranges are checked after extraction.
 */
const coordinatePairSchema = z.tuple([z.number().finite(), z.number().finite()]);

export const venueStaticSchema = z.object({
  venue_raw: z.object({
    location: z.object({
      coordinates: coordinatePairSchema
    })
  })
});

// =============================================================================
// DYNAMIC DATA
// =============================================================================

export const deliverySpecsSchema = z.object({
  order_minimum_no_surcharge: z.number().int(),
  delivery_pricing: deliveryPricingSchema
});

export const venueDynamicSchema = z.object({
  venue_raw: z.object({
    delivery_specs: deliverySpecsSchema
  })
});

// =============================================================================
// TYPE EXPORTS
// =============================================================================

export type VenueStaticPayload = z.infer<typeof venueStaticSchema>;
export type VenueDynamicPayload = z.infer<typeof venueDynamicSchema>;
export type DeliverySpecs = z.infer<typeof deliverySpecsSchema>;

export interface VenueLocation {
  lat: number;
  lon: number;
}
