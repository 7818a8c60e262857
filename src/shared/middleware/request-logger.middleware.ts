/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * One log line per finished request, levelled by status class.
 * Health probes arrive every few seconds from the balancer, so they are
 * logged at debug.
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';

const QUIET_PATH_PREFIX = '/health';

/**
 * Request logger middleware
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const logData = {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration: `${duration}ms`,
      ...(Object.keys(req.query).length > 0 && { query: req.query })
    };

    if (res.statusCode >= 500) {
      logger.error('Request failed', logData);
    } else if (res.statusCode >= 400) {
      logger.warn('Request error', logData);
    } else if (req.path.startsWith(QUIET_PATH_PREFIX)) {
      logger.debug('Health probe served', logData);
    } else {
      logger.info('Request completed', logData);
    }
  });

  next();
}
