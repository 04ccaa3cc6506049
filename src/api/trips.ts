/**
 * Trip API routes
 * Implements GET /trips, GET /trips/:name endpoints
 *
 * Each GET /trips/:name runs one retrieval. The last successful result per trip
 * is kept in memory: when a later retrieval fails, that result is served again
 * with `available: false` instead of being cleared. Overlapping retrievals for
 * the same trip may finish out of order; a result never replaces one from a
 * retrieval that started later.
 */

import { Router, type Request, type Response } from 'express';
import { MalformedResponseError, UpstreamError } from '../errors.js';
import type { TripDefinition } from '../config/index.js';
import type { JourneyRetriever, JourneyWithRealtime } from '../services/journey-retriever.js';
import { summarizeJourney } from '../utils/journey-summary.js';
import type { Logger } from '../utils/logger.js';

interface TripSnapshot {
  journeys: JourneyWithRealtime[];
  retrievedAt: Date;
  /** Order in which the producing retrieval started */
  sequence: number;
}

export interface TripsRouterDependencies {
  trips: readonly TripDefinition[];
  retriever: Pick<JourneyRetriever, 'retrieve'>;
  logger: Logger;
  now?: () => Date;
}

export function createTripsRouter(deps: TripsRouterDependencies): Router {
  const router = Router();
  const snapshots = new Map<string, TripSnapshot>();
  let retrievalSequence = 0;
  const now = deps.now ?? (() => new Date());

  const renderSnapshot = (trip: TripDefinition, snapshot: TripSnapshot) => ({
    trip: trip.name,
    last_updated: snapshot.retrievedAt.toISOString(),
    journeys: snapshot.journeys.map((pair) => summarizeJourney(pair, trip.fareType, now())),
  });

  /**
   * GET /trips
   * List configured trips
   */
  router.get('/', (req: Request, res: Response): void => {
    res.status(200).json({
      trips: deps.trips.map((trip) => ({
        name: trip.name,
        origin_stop_id: trip.originStopId,
        destination_stop_id: trip.destinationStopId,
        num_journeys: trip.numJourneys,
        fare_type: trip.fareType,
        modes_of_transport: trip.modesOfTransport ?? null,
      })),
    });
  });

  /**
   * GET /trips/:name
   * Retrieve upcoming journeys for a configured trip, with realtime vehicle positions
   */
  router.get('/:name', async (req: Request, res: Response): Promise<void> => {
    const correlationId = req.correlationId;
    const trip = deps.trips.find((candidate) => candidate.name === req.params.name);

    if (!trip) {
      res.status(404).json({
        error: 'Trip not found',
        trip: req.params.name,
      });
      return;
    }

    const sequence = ++retrievalSequence;

    try {
      const journeys = await deps.retriever.retrieve(trip, correlationId);
      const snapshot: TripSnapshot = { journeys, retrievedAt: now(), sequence };

      const current = snapshots.get(trip.name);
      if (!current || current.sequence < sequence) {
        snapshots.set(trip.name, snapshot);
      }

      res.status(200).json({ ...renderSnapshot(trip, snapshot), available: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      deps.logger.error('Trip retrieval failed', {
        trip: trip.name,
        error: message,
        correlation_id: correlationId,
      });

      const previous = snapshots.get(trip.name);
      if (previous) {
        res.status(200).json({ ...renderSnapshot(trip, previous), available: false, error: message });
        return;
      }

      const upstreamFailure = error instanceof UpstreamError || error instanceof MalformedResponseError;
      res.status(upstreamFailure ? 502 : 500).json({
        error: upstreamFailure ? 'Trip planner unavailable' : 'Internal server error',
        message,
        trip: trip.name,
        available: false,
      });
    }
  });

  return router;
}
