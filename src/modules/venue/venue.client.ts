/**
 * =============================================================================
 * VENUE MODULE - CLIENT
 * =============================================================================
 *
 * Reads venue data over a pooled upstream connection and validates it.
 *
 * FAILURES (all returned, never thrown):
 * - Transport error or timeout  → UpstreamFailureError
 * - Any status other than 200   → UpstreamFailureError "Request failed with status: N"
 * - Payload of the wrong shape  → UpstreamDataInvalidError
 * =============================================================================
 */

import { z } from 'zod';
import { HTTP_STATUS } from '../../core/constants';
import { UpstreamDataInvalidError, UpstreamFailureError } from '../../core/errors/AppError';
import { Result, err, ok } from '../../core/result';
import { UpstreamConnection } from '../../shared/upstream/upstream-connection';
import { validateCoordinates } from '../pricing/pricing.engine';
import {
  DeliverySpecs,
  VenueLocation,
  venueDynamicSchema,
  venueStaticSchema
} from './venue.schema';

export type VenueFetchError = UpstreamFailureError | UpstreamDataInvalidError;

export function venuePath(venueSlug: string, kind: 'static' | 'dynamic'): string {
  return `/venues/${encodeURIComponent(venueSlug)}/${kind}`;
}

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

async function fetchVenueJson(
  connection: UpstreamConnection,
  path: string
): Promise<Result<unknown, UpstreamFailureError>> {
  const response = await connection.get(path);
  if (!response.ok) {
    return response;
  }
  if (response.value.status !== HTTP_STATUS.OK) {
    return err(new UpstreamFailureError(`Request failed with status: ${response.value.status}`, {
      status: response.value.status
    }));
  }
  return ok(response.value.data);
}

/**
 * Pull the venue's coordinates out of a static payload ([lon, lat] on the wire)
 */
export function extractVenueLocation(payload: unknown): Result<VenueLocation, UpstreamDataInvalidError> {
  const parsed = venueStaticSchema.safeParse(payload);
  if (!parsed.success) {
    return err(new UpstreamDataInvalidError(`Invalid venue static data: ${formatIssues(parsed.error)}`));
  }

  const [lon, lat] = parsed.data.venue_raw.location.coordinates;
  const valid = validateCoordinates(lat, lon);
  if (!valid.ok) {
    return err(new UpstreamDataInvalidError(valid.error));
  }
  return ok({ lat, lon });
}

export function extractDeliverySpecs(payload: unknown): Result<DeliverySpecs, UpstreamDataInvalidError> {
  const parsed = venueDynamicSchema.safeParse(payload);
  if (!parsed.success) {
    return err(new UpstreamDataInvalidError(`Invalid venue dynamic data: ${formatIssues(parsed.error)}`));
  }
  return ok(parsed.data.venue_raw.delivery_specs);
}

export async function fetchVenueLocation(
  connection: UpstreamConnection,
  venueSlug: string
): Promise<Result<VenueLocation, VenueFetchError>> {
  const payload = await fetchVenueJson(connection, venuePath(venueSlug, 'static'));
  return payload.ok ? extractVenueLocation(payload.value) : payload;
}

export async function fetchDeliverySpecs(
  connection: UpstreamConnection,
  venueSlug: string
): Promise<Result<DeliverySpecs, VenueFetchError>> {
  const payload = await fetchVenueJson(connection, venuePath(venueSlug, 'dynamic'));
  return payload.ok ? extractDeliverySpecs(payload.value) : payload;
}
