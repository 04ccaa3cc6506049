/**
 * Unit tests for journey summaries
 */

import { describe, it, expect } from 'vitest';
import {
  productClassIcon,
  summarizeFares,
  summarizeJourney,
} from '../../../src/utils/journey-summary.js';
import { parseTripResponseText } from '../../../src/services/trip-response.js';
import { RouteProductClass, type Journey } from '../../../src/types/trip.js';
import type { VehiclePositionEntity } from '../../../src/types/realtime.js';
import { buildLeg, buildTicket, readTripResponseFixture } from '../../helpers/fixtures.js';

const now = new Date('2024-05-01T08:00:00Z');

const vehicle: VehiclePositionEntity = {
  id: 'v1',
  trip: { tripId: 'T1' },
  vehicle: { id: 'bus-v1', position: { latitude: -33.8, longitude: 151.2 } },
};

describe('summarizeJourney', () => {
  const [busJourney, walkingJourney] = parseTripResponseText(readTripResponseFixture()).journeys;

  it('should summarize the transport legs around walking legs', () => {
    expect(summarizeJourney({ journey: busJourney, realtime: vehicle }, 'ADULT', now)).toEqual({
      due_minutes: 4,
      origin_stop_id: '2018124',
      origin_name: 'Gardeners Rd at Botany Rd, Rosebery',
      destination_stop_id: '200039',
      destination_name: 'Central Station, Eddy Av',
      departure_time_estimated: '2024-05-01T08:04:00.000Z',
      departure_time_planned: '2024-05-01T08:02:00.000Z',
      arrival_time_estimated: '2024-05-01T08:25:00.000Z',
      arrival_time_planned: '2024-05-01T08:22:00.000Z',
      origin_transport_type: RouteProductClass.BUS,
      origin_transport_name: 'BUS',
      origin_line_name: '343',
      origin_line_name_short: '343',
      changes: 0,
      occupancy: 'FEW_SEATS',
      real_time_trip_id: 'T1',
      fare_type: 'ADULT',
      fare_price: '4.50',
      fares: { ADULT: '4.50', CHILD: '2.25', SCHOLAR: null, SENIOR: '2.50' },
      latitude: -33.8,
      longitude: 151.2,
      icon: 'mdi:bus',
    });
  });

  it('should report occupancy from the destination stop of the origin leg, not the boarding stop', () => {
    const leg = buildLeg(RouteProductClass.TRAIN, 'S1');
    const journey: Journey = {
      isAdditional: 0,
      legs: [
        {
          ...leg,
          origin: { ...leg.origin, properties: { occupancy: 'STANDING_ONLY' } },
          destination: { ...leg.destination, properties: { occupancy: 'MANY_SEATS' } },
        },
        buildLeg(RouteProductClass.BUS, 'B1', 'second'),
      ],
      fare: { tickets: [] },
    };

    expect(summarizeJourney({ journey, realtime: undefined }, 'ADULT', now).occupancy).toBe('MANY_SEATS');
  });

  it('should use the requested rider category for the fare price', () => {
    const summary = summarizeJourney({ journey: busJourney, realtime: undefined }, 'SCHOLAR', now);

    expect(summary.fare_type).toBe('SCHOLAR');
    expect(summary.fare_price).toBeNull();
    expect(summary.latitude).toBeNull();
    expect(summary.longitude).toBeNull();
  });

  it('should return null fields for an all-walking journey', () => {
    expect(summarizeJourney({ journey: walkingJourney, realtime: undefined }, 'ADULT', now)).toEqual({
      due_minutes: null,
      origin_stop_id: null,
      origin_name: null,
      destination_stop_id: null,
      destination_name: null,
      departure_time_estimated: null,
      departure_time_planned: null,
      arrival_time_estimated: null,
      arrival_time_planned: null,
      origin_transport_type: null,
      origin_transport_name: null,
      origin_line_name: null,
      origin_line_name_short: null,
      changes: -1,
      occupancy: null,
      real_time_trip_id: null,
      fare_type: 'ADULT',
      fare_price: null,
      fares: { ADULT: null, CHILD: null, SCHOLAR: null, SENIOR: null },
      latitude: null,
      longitude: null,
      icon: 'mdi:clock',
    });
  });

  it('should round due minutes down and never go below zero', () => {
    expect(
      summarizeJourney({ journey: busJourney, realtime: vehicle }, 'ADULT', new Date('2024-05-01T08:01:30Z'))
        .due_minutes
    ).toBe(2);
    expect(
      summarizeJourney({ journey: busJourney, realtime: vehicle }, 'ADULT', new Date('2024-05-01T08:10:00Z'))
        .due_minutes
    ).toBe(0);
  });

  it('should fall back to the planned departure when there is no estimate', () => {
    const leg = buildLeg(RouteProductClass.FERRY, 'F1');
    const journey: Journey = {
      isAdditional: 0,
      legs: [
        {
          ...leg,
          origin: { ...leg.origin, departureTimePlanned: new Date('2024-05-01T08:12:00Z') },
        },
      ],
      fare: { tickets: [] },
    };

    const summary = summarizeJourney({ journey, realtime: undefined }, 'ADULT', now);

    expect(summary.due_minutes).toBe(12);
    expect(summary.departure_time_estimated).toBeNull();
    expect(summary.icon).toBe('mdi:ferry');
  });
});

describe('summarizeFares', () => {
  it('should take the first ticket per category', () => {
    const journey: Journey = {
      isAdditional: 0,
      legs: [buildLeg(RouteProductClass.TRAIN)],
      fare: {
        tickets: [
          buildTicket('ADULT', '3.2', 'ADULT-1'),
          buildTicket('ADULT', '9.99', 'ADULT-2'),
          buildTicket('SCHOLAR', '0'),
        ],
      },
    };

    expect(summarizeFares(journey)).toEqual({ ADULT: '3.20', CHILD: null, SCHOLAR: '0.00', SENIOR: null });
  });
});

describe('productClassIcon', () => {
  it.each([
    [RouteProductClass.TRAIN, 'mdi:train'],
    [RouteProductClass.LIGHT_RAIL, 'mdi:tram'],
    [RouteProductClass.SCHOOL_BUS, 'mdi:bus'],
    [RouteProductClass.TAXI, 'mdi:taxi'],
    [RouteProductClass.PARK_AND_RIDE, 'mdi:car'],
  ])('should map class %s to %s', (klass, icon) => {
    expect(productClassIcon(klass)).toBe(icon);
  });

  it('should default to the clock without a class', () => {
    expect(productClassIcon(undefined)).toBe('mdi:clock');
  });
});
