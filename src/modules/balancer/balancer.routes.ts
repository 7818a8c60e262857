/**
 * =============================================================================
 * BALANCER MODULE - ROUTES
 * =============================================================================
 *
 * GET {PRICING_ENDPOINT}  - relayed to a healthy instance, response untouched
 * *   {PRICING_ENDPOINT}  - 405, answered by the balancer itself
 * GET /balancer/status    - instance table and healthy set
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { MethodNotAllowedError } from '../../core/errors/AppError';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { LoadBalancer } from './load-balancer';

/**
 * Query string exactly as the client sent it, without the '?'
 */
export function rawQueryString(originalUrl: string): string {
  const queryStart = originalUrl.indexOf('?');
  return queryStart === -1 ? '' : originalUrl.slice(queryStart + 1);
}

export function createBalancerRouter(endpoint: string, balancer: LoadBalancer): Router {
  const router = Router();

  /**
   * @route   GET {endpoint}
   * @desc    Forward a price request to the next healthy instance
   * @access  Public
   */
  router.get(
    endpoint,
    asyncHandler(async (req: Request, res: Response) => {
      const forwarded = await balancer.forward(rawQueryString(req.originalUrl));
      if (!forwarded.ok) {
        ApiResponse.failure(res, forwarded.error);
        return;
      }

      const { status, body, contentType } = forwarded.value;
      ApiResponse.raw(res, status, body, contentType);
    })
  );

  router.all(endpoint, (req: Request, res: Response) => {
    ApiResponse.failure(res, new MethodNotAllowedError(req.method));
  });

  /**
   * @route   GET /balancer/status
   * @desc    Instance table (internal)
   */
  router.get('/balancer/status', (_req: Request, res: Response) => {
    ApiResponse.success(res, balancer.getStatus());
  });

  return router;
}
