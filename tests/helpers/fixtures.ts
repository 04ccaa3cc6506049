/**
 * Shared test data builders
 */

import { readFileSync } from 'fs';
import GtfsRealtimeBindings from 'gtfs-realtime-bindings';
import { vi } from 'vitest';
import { Decimal } from 'decimal.js';
import {
  RouteProductClass,
  type JourneyFareTicket,
  type JourneyLeg,
  type PersonCategory,
} from '../../src/types/trip.js';

const { FeedMessage } = GtfsRealtimeBindings.transit_realtime;

export function readTripResponseFixture(): string {
  return readFileSync(new URL('../fixtures/trip-response.json', import.meta.url), 'utf-8');
}

export function createMockLogger() {
  return {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  };
}

/**
 * A leg with the given product class; omit the class for a leg without transportation
 */
export function buildLeg(klass?: RouteProductClass, realtimeTripId?: string, stopId = 'stop'): JourneyLeg {
  return {
    duration: 600,
    origin: { id: `${stopId}-origin`, name: `${stopId} origin`, type: 'stop', properties: {} },
    destination: { id: `${stopId}-destination`, name: `${stopId} destination`, type: 'stop', properties: {} },
    transportation:
      klass === undefined
        ? undefined
        : {
            product: { name: RouteProductClass[klass], klass, iconId: klass },
            properties: { realtimeTripId },
          },
    infos: [],
  };
}

export function buildTicket(person: PersonCategory, price: string, id = `${person}-1`): JourneyFareTicket {
  return {
    id,
    name: person,
    comment: '',
    person,
    priceBrutto: new Decimal(price),
  };
}

export interface TestVehicle {
  id: string;
  tripId?: string;
  latitude?: number;
  longitude?: number;
  bearing?: number;
}

/**
 * Encode a GTFS-realtime vehicle position FeedMessage
 */
export function encodeVehicleFeed(vehicles: TestVehicle[]): Uint8Array {
  const message = FeedMessage.create({
    header: { gtfsRealtimeVersion: '2.0' },
    entity: vehicles.map((vehicle) => ({
      id: vehicle.id,
      vehicle: {
        trip: vehicle.tripId === undefined ? undefined : { tripId: vehicle.tripId },
        vehicle: { id: `bus-${vehicle.id}` },
        position:
          vehicle.latitude === undefined || vehicle.longitude === undefined
            ? undefined
            : { latitude: vehicle.latitude, longitude: vehicle.longitude, bearing: vehicle.bearing },
      },
    })),
  });
  return FeedMessage.encode(message).finish();
}
