#!/usr/bin/env node
/**
 * Diagnostic entry point: runs one bus trip query and prints the normalized fields
 *
 * Usage: journey-tracker <apiKey> [originStopId] [destinationStopId]
 * The API key may also come from TFNSW_API_KEY.
 */

import 'dotenv/config';
import { TripPlannerClient } from './services/trip-planner-client.js';
import { RealtimeFeedCache } from './services/realtime-feed-cache.js';
import { JourneyRetriever } from './services/journey-retriever.js';
import { countTransfers, firstNonWalkingLeg, formatPrice, selectTicket } from './utils/journey-utils.js';
import { createLogger } from './utils/logger.js';
import { RouteProductClass } from './types/trip.js';

async function main(): Promise<void> {
  const [apiKeyArg, origin = '222310', destination = '200060'] = process.argv.slice(2);
  const apiKey = apiKeyArg || process.env.TFNSW_API_KEY;

  if (!apiKey) {
    console.error('Usage: journey-tracker <apiKey> [originStopId] [destinationStopId]');
    process.exitCode = 2;
    return;
  }

  const logger = createLogger({ serviceName: 'journey-tracker-cli', level: process.env.LOG_LEVEL || 'warn' });
  const client = new TripPlannerClient({ apiKey });
  const retriever = new JourneyRetriever({
    planner: client,
    feedCache: new RealtimeFeedCache({ source: client, logger }),
    logger,
  });

  const results = await retriever.retrieve({
    originStopId: origin,
    destinationStopId: destination,
    numJourneys: 1,
    modesOfTransport: ['bus'],
  });

  for (const { journey, realtime } of results) {
    const originLeg = firstNonWalkingLeg(journey.legs, 'forward');
    const destinationLeg = firstNonWalkingLeg(journey.legs, 'reverse');

    if (!originLeg?.transportation || !destinationLeg) {
      console.log('Walking only, no transport legs');
      continue;
    }

    const start = originLeg.origin;
    const end = destinationLeg.destination;
    const transportation = originLeg.transportation;
    const adult = selectTicket(journey.fare.tickets, 'ADULT');

    console.log('Origin', start.id, start.name, start.disassembledName ?? '');
    console.log('Destination', end.id, end.name, end.disassembledName ?? '');
    console.log('Trip Changes', countTransfers(journey.legs));
    console.log('Origin Mode', RouteProductClass[transportation.product.klass]);
    console.log('Departure Time (est)', start.departureTimeEstimated?.toISOString() ?? '-');
    console.log('Departure Time (planned)', start.departureTimePlanned?.toISOString() ?? '-');
    console.log('Arrival Time (est)', end.arrivalTimeEstimated?.toISOString() ?? '-');
    console.log('Arrival Time (planned)', end.arrivalTimePlanned?.toISOString() ?? '-');
    console.log('Occupancy', start.properties.occupancy ?? '-', end.properties.occupancy ?? '-');
    console.log('RealTimeTrip', transportation.properties.realtimeTripId ?? '-');
    console.log('Origin Line (short)', transportation.disassembledName ?? '-');
    console.log('Origin Line', transportation.number ?? '-');
    console.log('Origin Line (desc)', transportation.description ?? '-');
    console.log('Adult Fare', adult ? formatPrice(adult.priceBrutto) : 'unavailable');

    const position = realtime?.vehicle.position;
    console.log('Vehicle Position', position ? `${position.latitude},${position.longitude}` : 'unavailable');
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
