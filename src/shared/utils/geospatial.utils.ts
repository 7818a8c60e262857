/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Haversine Distance Calculations
 * =============================================================================
 *
 * SCALABILITY: Pure functions, O(1) complexity, no I/O
 * MODULARITY: Used by the pricing engine and the venue payload validators
 *
 * =============================================================================
 */

import { EARTH_RADIUS_METERS } from '../../core/constants';

export const LATITUDE_RANGE = { MIN: -90, MAX: 90 } as const;
export const LONGITUDE_RANGE = { MIN: -180, MAX: 180 } as const;

/**
 * Great-circle distance between two GPS coordinates (Haversine formula)
 *
 * @returns Distance in meters, unrounded
 */
export function haversineDistanceMeters(
  lat1: number,
  lng1: number,
  lat2: number,
  lng2: number
): number {
  const dLat = toRadians(lat2 - lat1);
  const dLng = toRadians(lng2 - lng1);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(lat1)) *
      Math.cos(toRadians(lat2)) *
      Math.sin(dLng / 2) *
      Math.sin(dLng / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_METERS * c;
}

/**
 * Convert degrees to radians
 */
function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

export function isValidLatitude(lat: number): boolean {
  return Number.isFinite(lat) && lat >= LATITUDE_RANGE.MIN && lat <= LATITUDE_RANGE.MAX;
}

export function isValidLongitude(lon: number): boolean {
  return Number.isFinite(lon) && lon >= LONGITUDE_RANGE.MIN && lon <= LONGITUDE_RANGE.MAX;
}
