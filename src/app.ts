/**
 * Express application
 * Correlation IDs, request logging, routes and the error handler
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { randomUUID } from 'crypto';
import { createTripsRouter } from './api/trips.js';
import { createHealthRouter } from './api/health.js';
import type { TripDefinition } from './config/index.js';
import type { JourneyRetriever } from './services/journey-retriever.js';
import type { RealtimeFeedCache } from './services/realtime-feed-cache.js';
import type { Logger } from './utils/logger.js';
import { createMetricsRouter } from './utils/metrics.js';

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export interface AppDependencies {
  serviceName: string;
  trips: readonly TripDefinition[];
  retriever: Pick<JourneyRetriever, 'retrieve'>;
  feedCache: Pick<RealtimeFeedCache, 'size'>;
  logger: Logger;
}

export function createApp(deps: AppDependencies): Express {
  const { logger } = deps;
  const app = express();

  app.set('trust proxy', true);
  app.use(express.json());

  // Correlation ID
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header ? header : randomUUID();
    req.correlationId = correlationId;
    res.setHeader('X-Correlation-ID', correlationId);
    next();
  });

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info('HTTP request', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - start,
        correlation_id: req.correlationId,
      });
    });
    next();
  });

  app.use('/trips', createTripsRouter({ trips: deps.trips, retriever: deps.retriever, logger }));
  app.use(
    '/health',
    createHealthRouter({
      serviceName: deps.serviceName,
      tripCount: deps.trips.length,
      feedCache: deps.feedCache,
    })
  );
  app.use('/metrics', createMetricsRouter());

  // Error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error', {
      error: err.message,
      stack: err.stack,
      correlation_id: req.correlationId,
    });

    res.status(500).json({
      error: 'Internal server error',
      correlation_id: req.correlationId,
    });
  });

  return app;
}
