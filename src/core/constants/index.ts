/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * =============================================================================
 */

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Machine-readable error codes returned in every error body
 */
export enum ErrorCode {
  // Request
  INVALID_INPUT = 'INVALID_INPUT',
  METHOD_NOT_ALLOWED = 'METHOD_NOT_ALLOWED',
  NOT_FOUND = 'NOT_FOUND',

  // Upstream venue API
  UPSTREAM_FAILURE = 'UPSTREAM_FAILURE',
  UPSTREAM_DATA_INVALID = 'UPSTREAM_DATA_INVALID',

  // Pricing
  DISTANCE_EXCEEDED = 'DISTANCE_EXCEEDED',
  NO_RANGE_FOUND = 'NO_RANGE_FOUND',
  QUOTE_INVALID = 'QUOTE_INVALID',

  // Balancer
  NO_HEALTHY_BACKENDS = 'NO_HEALTHY_BACKENDS',
  BALANCER_ERROR = 'BALANCER_ERROR',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

/**
 * Pricing rejections a venue's fee table can produce
 */
export type PricingRejectionCode = ErrorCode.DISTANCE_EXCEEDED | ErrorCode.NO_RANGE_FOUND;

// =============================================================================
// UPSTREAM CONNECTION ROLES
// =============================================================================

/**
 * Each role owns its own pool of upstream connections
 */
export enum ConnectionRole {
  STATIC = 'static',
  DYNAMIC = 'dynamic'
}

export const CONNECTION_ROLES: readonly ConnectionRole[] = [ConnectionRole.STATIC, ConnectionRole.DYNAMIC];

// =============================================================================
// BACKEND INSTANCE STATUS
// =============================================================================

/**
 * Balancer view of one pricing instance
 *
 * STARTING → HEALTHY ⇄ UNHEALTHY (no terminal state while the balancer runs)
 */
export enum InstanceStatus {
  STARTING = 'starting',
  HEALTHY = 'healthy',
  UNHEALTHY = 'unhealthy'
}

// =============================================================================
// PRICING LIMITS
// =============================================================================

export const EARTH_RADIUS_METERS = 6371000;

/**
 * Upper bounds on a quote's components (minor currency units / meters)
 */
export const QUOTE_LIMITS = {
  MAX_DELIVERY_FEE: 1500000,
  MAX_DISTANCE_METERS: 2000000
} as const;

/**
 * Query parameters the pricing endpoint requires
 */
export const REQUIRED_QUERY_PARAMS = ['venue_slug', 'cart_value', 'user_lat', 'user_lon'] as const;
