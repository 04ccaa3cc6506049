/**
 * Prometheus metrics
 */

import { Router, type Request, type Response } from 'express';
import { Counter, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();

export const tripQueriesTotal = new Counter({
  name: 'trip_queries_total',
  help: 'Trip planner retrievals by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const realtimeFeedFetchesTotal = new Counter({
  name: 'realtime_feed_fetches_total',
  help: 'Upstream vehicle position feed fetches by mode and outcome',
  labelNames: ['mode', 'outcome'] as const,
  registers: [registry],
});

export function enableDefaultMetrics(): void {
  collectDefaultMetrics({ register: registry });
}

export function createMetricsRouter(): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response): Promise<void> => {
    res.setHeader('Content-Type', registry.contentType);
    res.send(await registry.metrics());
  });

  return router;
}
