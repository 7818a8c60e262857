/**
 * =============================================================================
 * HEALTH CHECK ROUTES
 * =============================================================================
 *
 * Mounted on every pricing instance and on the balancer.
 *
 * ENDPOINTS:
 * - GET /health          - Probe used by the balancer (200 {"status":"healthy"})
 * - GET /health/live     - Liveness: pid and uptime
 * - GET /health/detailed - Process stats plus whatever the owner reports
 *                          (admission and pool stats, or the instance table)
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { config } from '../../config/environment';

/**
 * Component-specific section of /health/detailed
 */
export type DetailedHealthProvider = () => Record<string, unknown>;

export function createHealthRouter(role: string, detailed: DetailedHealthProvider): Router {
  const router = Router();
  const startTime = Date.now();

  /**
   * Basic health check - for the balancer's probe loop
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'healthy' });
  });

  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor((Date.now() - startTime) / 1000)
    });
  });

  /**
   * Internal diagnostics
   */
  router.get('/health/detailed', (_req: Request, res: Response) => {
    const memUsage = process.memoryUsage();
    const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);

    res.json({
      status: 'healthy',
      role,
      environment: config.nodeEnv,
      timestamp: new Date().toISOString(),
      server: {
        pid: process.pid,
        uptime: formatUptime(uptimeSeconds),
        uptimeSeconds,
        nodeVersion: process.version
      },
      memory: {
        heapUsed: formatBytes(memUsage.heapUsed),
        heapTotal: formatBytes(memUsage.heapTotal),
        rss: formatBytes(memUsage.rss)
      },
      ...detailed()
    });
  });

  return router;
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let value = bytes;
  let unitIndex = 0;

  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  return `${value.toFixed(2)} ${units[unitIndex]}`;
}

export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  parts.push(`${secs}s`);

  return parts.join(' ');
}
