/**
 * Journey retrieval
 *
 * Queries the trip planner for a configured trip and pairs each journey with
 * the live position of the vehicle serving its first non-walking leg, when
 * the realtime feed has one.
 */

import type { Journey, ModeOfTransport } from '../types/trip.js';
import type { VehiclePositionEntity } from '../types/realtime.js';
import type { TripPlanner } from './trip-planner-client.js';
import type { RealtimeFeedCache } from './realtime-feed-cache.js';
import type { Logger } from '../utils/logger.js';
import { findRealtimeEntity, firstNonWalkingLeg, gtfsModeKey } from '../utils/journey-utils.js';
import { tripQueriesTotal } from '../utils/metrics.js';

export interface TripRequest {
  originStopId: string;
  destinationStopId: string;
  numJourneys: number;
  modesOfTransport?: readonly ModeOfTransport[];
}

export interface JourneyWithRealtime {
  journey: Journey;
  /** Undefined when there is no transport leg, no realtime trip id or no match in the feed */
  realtime: VehiclePositionEntity | undefined;
}

interface JourneyRetrieverDependencies {
  planner: TripPlanner;
  feedCache: Pick<RealtimeFeedCache, 'get'>;
  logger: Logger;
}

export class JourneyRetriever {
  private planner: TripPlanner;
  private feedCache: Pick<RealtimeFeedCache, 'get'>;
  private logger: Logger;

  constructor(deps: JourneyRetrieverDependencies) {
    if (!deps.planner) {
      throw new Error('planner is required');
    }
    if (!deps.feedCache) {
      throw new Error('feedCache is required');
    }
    if (!deps.logger) {
      throw new Error('logger is required');
    }
    this.planner = deps.planner;
    this.feedCache = deps.feedCache;
    this.logger = deps.logger;
  }

  /**
   * Run one retrieval. Journey order matches the trip planner response.
   * Any failure (query or feed) fails the whole retrieval.
   */
  async retrieve(trip: TripRequest, correlationId?: string): Promise<JourneyWithRealtime[]> {
    let results: JourneyWithRealtime[];
    try {
      const response = await this.planner.queryTrip(
        {
          origin: trip.originStopId,
          destination: trip.destinationStopId,
          numJourneys: trip.numJourneys,
          includeModes: trip.modesOfTransport,
        },
        correlationId
      );

      results = await Promise.all(
        response.journeys.map(async (journey): Promise<JourneyWithRealtime> => ({
          journey,
          realtime: await this.findRealtime(journey, correlationId),
        }))
      );
    } catch (error) {
      tripQueriesTotal.inc({ outcome: 'error' });
      throw error;
    }

    tripQueriesTotal.inc({ outcome: 'success' });
    this.logger.info('Journeys retrieved', {
      correlation_id: correlationId,
      origin: trip.originStopId,
      destination: trip.destinationStopId,
      journey_count: results.length,
      realtime_matches: results.filter((result) => result.realtime !== undefined).length,
    });

    return results;
  }

  private async findRealtime(
    journey: Journey,
    correlationId?: string
  ): Promise<VehiclePositionEntity | undefined> {
    const originLeg = firstNonWalkingLeg(journey.legs, 'forward');
    const transportation = originLeg?.transportation;
    if (!transportation) {
      return undefined;
    }

    const realtimeTripId = transportation.properties.realtimeTripId;
    const mode = gtfsModeKey(transportation.product.klass);
    if (realtimeTripId === undefined || mode === undefined) {
      return undefined;
    }

    const feed = await this.feedCache.get(mode);
    const entity = findRealtimeEntity(feed, realtimeTripId);

    if (!entity) {
      this.logger.debug('No realtime match for trip', {
        correlation_id: correlationId,
        mode,
        realtime_trip_id: realtimeTripId,
      });
    }
    return entity;
  }
}
