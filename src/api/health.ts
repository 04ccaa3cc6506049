/**
 * Health check endpoint
 */

import { Router, type Request, type Response } from 'express';
import type { RealtimeFeedCache } from '../services/realtime-feed-cache.js';

export interface HealthRouterDependencies {
  serviceName: string;
  tripCount: number;
  feedCache: Pick<RealtimeFeedCache, 'size'>;
}

export function createHealthRouter(deps: HealthRouterDependencies): Router {
  const router = Router();

  /**
   * GET /health
   * The service holds no connections; upstream availability is reported per trip by GET /trips/:name
   */
  router.get('/', (req: Request, res: Response): void => {
    res.status(200).json({
      status: 'healthy',
      service: deps.serviceName,
      timestamp: new Date().toISOString(),
      trips_configured: deps.tripCount,
      realtime_cache: {
        entries: deps.feedCache.size,
      },
    });
  });

  return router;
}
