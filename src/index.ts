/**
 * journey-tracker service entry point
 * Serves upcoming journeys for the configured trips, enriched with live vehicle positions
 */

import 'dotenv/config';
import type { Server } from 'http';
import { loadConfig, loadTripDefinitions } from './config/index.js';
import { createApp } from './app.js';
import { TripPlannerClient } from './services/trip-planner-client.js';
import { RealtimeFeedCache } from './services/realtime-feed-cache.js';
import { JourneyRetriever } from './services/journey-retriever.js';
import { createLogger, type Logger } from './utils/logger.js';
import { enableDefaultMetrics } from './utils/metrics.js';

let logger: Logger = createLogger({
  serviceName: process.env.SERVICE_NAME || 'journey-tracker',
  level: process.env.LOG_LEVEL || 'info',
});

let server: Server | undefined;

function start(): void {
  try {
    const config = loadConfig();
    logger = createLogger({ serviceName: config.serviceName, level: config.logLevel });

    const trips = loadTripDefinitions(config.tripsFile);

    const client = new TripPlannerClient({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      timeoutMs: config.httpTimeoutMs,
    });
    const feedCache = new RealtimeFeedCache({ source: client, logger });
    const retriever = new JourneyRetriever({ planner: client, feedCache, logger });

    enableDefaultMetrics();

    const app = createApp({
      serviceName: config.serviceName,
      trips,
      retriever,
      feedCache,
      logger,
    });

    server = app.listen(config.port, () => {
      logger.info(`${config.serviceName} listening`, {
        port: config.port,
        trips: trips.map((trip) => trip.name),
      });
    });
  } catch (error) {
    logger.error('Failed to start service', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('SIGTERM received, shutting down gracefully...');

  if (!server) {
    process.exit(0);
  }

  server.close((error) => {
    if (error) {
      logger.error('Error during shutdown', { error: error.message });
      process.exit(1);
    }
    logger.info('Shutdown complete');
    process.exit(0);
  });
});

start();
