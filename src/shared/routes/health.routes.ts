/**
 * =============================================================================
 * HEALTH CHECK ROUTES
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health       - Readiness: seat lock store and booking store status
 * - GET /health/live  - Liveness check (is the process running?)
 *
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { DatabaseService } from '../database/db';
import { RedisService } from '../services/redis.service';

export function createHealthRouter(redis: RedisService, database: DatabaseService): Router {
  const router = Router();
  const startTime = Date.now();

  /**
   * Readiness - 503 when the seat lock store is unreachable
   */
  router.get('/health', async (_req: Request, res: Response) => {
    const store = await redis.healthCheck();

    const healthy = store.status === 'healthy';
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      checks: {
        store,
        database: { status: 'healthy', ...database.getStats() }
      }
    });
  });

  /**
   * Liveness check
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor((Date.now() - startTime) / 1000)
    });
  });

  return router;
}
