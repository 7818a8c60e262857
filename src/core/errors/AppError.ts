/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // Expected failures travel as values
 * return err(new UpstreamFailureError('Request timed out'));
 *
 * // Route handler
 * res.status(error.statusCode).json(error.toJSON());
 * ```
 *
 * Expected failures (bad input, upstream trouble, pricing rejections) are
 * returned through Result values. Only genuine faults are thrown, and those
 * end up in the global error middleware.
 *
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS, PricingRejectionCode } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): ErrorResponse {
    return {
      success: false,
      error: this.message,
      code: this.code,
      ...(this.details && { details: this.details })
    };
  }
}

/**
 * Error response format
 */
export interface ErrorResponse {
  success: false;
  error: string;
  code: string;
  details?: Record<string, unknown>;
}

// =============================================================================
// REQUEST ERRORS
// =============================================================================

/**
 * 400 - Missing or malformed query parameters
 */
export class InvalidInputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, HTTP_STATUS.BAD_REQUEST, ErrorCode.INVALID_INPUT, true, details);
  }
}

/**
 * 405 - Anything but GET on the pricing endpoint
 */
export class MethodNotAllowedError extends AppError {
  constructor(method: string) {
    super(
      `Method ${method} not supported. Only GET requests are allowed.`,
      HTTP_STATUS.METHOD_NOT_ALLOWED,
      ErrorCode.METHOD_NOT_ALLOWED
    );
  }
}

// =============================================================================
// UPSTREAM ERRORS
// =============================================================================

/**
 * 400 - Venue API unreachable, timed out or answered non-200
 */
export class UpstreamFailureError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, HTTP_STATUS.BAD_REQUEST, ErrorCode.UPSTREAM_FAILURE, true, details);
  }
}

/**
 * 400 - Venue API answered with a payload of the wrong shape
 */
export class UpstreamDataInvalidError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, HTTP_STATUS.BAD_REQUEST, ErrorCode.UPSTREAM_DATA_INVALID, true, details);
  }
}

// =============================================================================
// PRICING ERRORS
// =============================================================================

/**
 * 400 - The venue's fee table rejects the delivery distance
 */
export class PricingRejectedError extends AppError {
  public readonly reason: PricingRejectionCode;

  constructor(reason: PricingRejectionCode, message: string, distance: number) {
    super(message, HTTP_STATUS.BAD_REQUEST, reason, true, { distance });
    this.reason = reason;
  }
}

/**
 * 400 - Computed quote breaks a response invariant (e.g. zero distance)
 */
export class QuoteInvariantError extends AppError {
  constructor(message: string) {
    super(message, HTTP_STATUS.BAD_REQUEST, ErrorCode.QUOTE_INVALID);
  }
}

// =============================================================================
// BALANCER ERRORS
// =============================================================================

/**
 * 503 - Healthy set is empty
 */
export class NoHealthyBackendsError extends AppError {
  constructor() {
    super('No healthy services available', HTTP_STATUS.SERVICE_UNAVAILABLE, ErrorCode.NO_HEALTHY_BACKENDS);
  }
}

/**
 * 500 - Transport failure while forwarding to an instance
 */
export class BalancerError extends AppError {
  constructor(message: string, port: number) {
    super(`Load balancer error: ${message}`, HTTP_STATUS.INTERNAL_ERROR, ErrorCode.BALANCER_ERROR, true, { port });
  }
}

// =============================================================================
// ERROR TYPE GUARDS
// =============================================================================

/**
 * Check if error is an operational (expected) error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Message of anything thrown, for logs and error bodies
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
