/**
 * =============================================================================
 * API RESPONSE BUILDER
 * =============================================================================
 *
 * Response helpers shared by the pricing instance and the balancer.
 *
 * RESPONSE FORMAT:
 * - Success: the payload itself, no envelope (clients read total_price at top level)
 * - Failure: { "success": false, "error": "<message>", "code": "<ErrorCode>" }
 *
 * USAGE:
 * ```typescript
 * return ApiResponse.success(res, quote);
 * return ApiResponse.failure(res, new InvalidInputError('Missing required parameters: venue_slug'));
 * ```
 *
 * =============================================================================
 */

import { Response } from 'express';
import { HTTP_STATUS } from '../constants';
import { AppError } from '../errors/AppError';
import { Result } from '../result';

export class ApiResponse {
  /**
   * 200 OK - Bare JSON payload
   */
  static success<T>(res: Response, data: T): Response {
    return res.status(HTTP_STATUS.OK).json(data);
  }

  /**
   * Error body with the error's own status code
   */
  static failure(res: Response, error: AppError): Response {
    return res.status(error.statusCode).json(error.toJSON());
  }

  /**
   * Send whichever side of a Result came back
   */
  static fromResult<T>(res: Response, result: Result<T, AppError>): Response {
    return result.ok ? ApiResponse.success(res, result.value) : ApiResponse.failure(res, result.error);
  }

  /**
   * Relay an already-serialized body (balancer → client)
   */
  static raw(res: Response, status: number, body: string, contentType?: string): Response {
    res.status(status);
    if (contentType) {
      res.type(contentType);
    }
    return res.send(body);
  }
}
