/**
 * =============================================================================
 * PRICING MODULE - SERVICE
 * =============================================================================
 *
 * Delivery order price pipeline for one instance.
 *
 * PIPELINE:
 * 1. Validate the query (no network before this passes)
 * 2. Take an admission permit
 * 3. Static venue data  → venue coordinates
 * 4. Dynamic venue data → delivery specs
 * 5. Distance → fee → small order surcharge → quote
 * 6. Permit returned on every exit path
 *
 * Every expected failure comes back as a Result; nothing here throws for
 * bad input, upstream trouble or a rejected distance.
 * =============================================================================
 */

import { z } from 'zod';
import { ConnectionRole, REQUIRED_QUERY_PARAMS } from '../../core/constants';
import {
  InvalidInputError,
  PricingRejectedError,
  QuoteInvariantError
} from '../../core/errors/AppError';
import { Result, err } from '../../core/result';
import { AdmissionGate } from '../../shared/resilience/admission-gate';
import { logger } from '../../shared/services/logger.service';
import { UpstreamConnection } from '../../shared/upstream/upstream-connection';
import { VenueFetchError, fetchDeliverySpecs, fetchVenueLocation } from '../venue/venue.client';
import { buildQuote, deliveryFee, distance, smallOrderSurcharge } from './pricing.engine';
import { DeliveryOrderRequest, DeliveryPriceResponse, deliveryOrderQuerySchema } from './pricing.schema';

export type PricingFailure =
  | InvalidInputError
  | VenueFetchError
  | PricingRejectedError
  | QuoteInvariantError;

export type QuoteResult = Result<DeliveryPriceResponse, PricingFailure>;

/**
 * Where the service gets its upstream connections (the pool, or a test double)
 */
export interface ConnectionSource {
  acquire(role: ConnectionRole): UpstreamConnection;
}

/**
 * Raw query values as Express hands them over
 */
export type RawQuery = Record<string, unknown>;

function formatValidationIssues(error: z.ZodError): string {
  return error.errors
    .map(issue => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
}

/**
 * Turn raw query parameters into a frozen, validated request
 */
export function parseDeliveryOrderQuery(query: RawQuery): Result<DeliveryOrderRequest, InvalidInputError> {
  const missing = REQUIRED_QUERY_PARAMS.filter(param => query[param] === undefined);
  if (missing.length > 0) {
    return err(new InvalidInputError(`Missing required parameters: ${missing.join(', ')}`, { missing }));
  }

  const parsed = deliveryOrderQuerySchema.safeParse(query);
  if (!parsed.success) {
    return err(new InvalidInputError(`Validation error: ${formatValidationIssues(parsed.error)}`));
  }

  return { ok: true, value: Object.freeze(parsed.data) };
}

export class OrderPriceService {
  constructor(
    private readonly connections: ConnectionSource,
    private readonly gate: AdmissionGate
  ) {}

  /**
   * Price a delivery order from raw query parameters
   */
  async quote(query: RawQuery): Promise<QuoteResult> {
    const request = parseDeliveryOrderQuery(query);
    if (!request.ok) {
      logger.warn('Rejected delivery order query', { error: request.error.message });
      return request;
    }

    return this.gate.run(() => this.price(request.value));
  }

  /**
   * Price an already validated request
   */
  async price(request: DeliveryOrderRequest): Promise<QuoteResult> {
    const { venue_slug: venueSlug, cart_value: cartValue } = request;
    logger.info(`Processing request for venue: ${venueSlug}`, { cartValue });

    const location = await fetchVenueLocation(this.connections.acquire(ConnectionRole.STATIC), venueSlug);
    if (!location.ok) {
      logger.error(`Failed to get static data: ${location.error.message}`, { venueSlug });
      return location;
    }

    const specs = await fetchDeliverySpecs(this.connections.acquire(ConnectionRole.DYNAMIC), venueSlug);
    if (!specs.ok) {
      logger.error(`Failed to get dynamic data: ${specs.error.message}`, { venueSlug });
      return specs;
    }

    const meters = distance(request.user_lat, request.user_lon, location.value.lat, location.value.lon);

    const fee = deliveryFee(meters, specs.value.delivery_pricing);
    if (!fee.ok) {
      logger.info(`Delivery rejected for venue ${venueSlug}`, { reason: fee.reason, distance: meters });
      return err(new PricingRejectedError(fee.reason, fee.message, meters));
    }

    const surcharge = smallOrderSurcharge(cartValue, specs.value.order_minimum_no_surcharge);
    return buildQuote(cartValue, fee.fee, meters, surcharge);
  }
}
