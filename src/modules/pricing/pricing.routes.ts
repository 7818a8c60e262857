/**
 * =============================================================================
 * PRICING MODULE - ROUTES
 * =============================================================================
 *
 * GET {PRICING_ENDPOINT}?venue_slug=&cart_value=&user_lat=&user_lon=
 *
 * 200 → bare DeliveryPriceResponse
 * 400 → invalid query, upstream failure or rejected distance
 * 405 → any other method
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { MethodNotAllowedError } from '../../core/errors/AppError';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { OrderPriceService } from './pricing.service';

export function createPricingRouter(endpoint: string, service: OrderPriceService): Router {
  const router = Router();

  /**
   * @route   GET {endpoint}
   * @desc    Price a delivery order
   * @access  Public
   */
  router.get(
    endpoint,
    asyncHandler(async (req: Request, res: Response) => {
      const quote = await service.quote(req.query);
      ApiResponse.fromResult(res, quote);
    })
  );

  router.all(endpoint, (req: Request, res: Response) => {
    ApiResponse.failure(res, new MethodNotAllowedError(req.method));
  });

  return router;
}
