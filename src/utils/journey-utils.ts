/**
 * Journey utilities
 * Pure selection helpers over the trip response model
 */

import type { Decimal } from 'decimal.js';
import {
  RouteProductClass,
  type GtfsModeKey,
  type JourneyFareTicket,
  type JourneyLeg,
  type PersonCategory,
} from '../types/trip.js';
import type { RealtimeFeed, VehiclePositionEntity } from '../types/realtime.js';

export type LegDirection = 'forward' | 'reverse';

const WALKING_CLASSES: ReadonlySet<RouteProductClass> = new Set([
  RouteProductClass.WALKING,
  RouteProductClass.WALKING_FOOTPATH,
]);

/**
 * Product class → realtime feed endpoint.
 * Only these four classes publish vehicle positions.
 */
const GTFS_MODE_KEYS: Record<RouteProductClass, GtfsModeKey | undefined> = {
  [RouteProductClass.TRAIN]: 'sydneytrains',
  [RouteProductClass.LIGHT_RAIL]: 'lightrail',
  [RouteProductClass.BUS]: 'buses',
  [RouteProductClass.COACH]: undefined,
  [RouteProductClass.FERRY]: 'ferries',
  [RouteProductClass.SCHOOL_BUS]: undefined,
  [RouteProductClass.WALKING]: undefined,
  [RouteProductClass.WALKING_FOOTPATH]: undefined,
  [RouteProductClass.BICYCLE]: undefined,
  [RouteProductClass.TAKE_BICYCLE_ON_PUBLIC_TRANSPORT]: undefined,
  [RouteProductClass.KISS_AND_RIDE]: undefined,
  [RouteProductClass.PARK_AND_RIDE]: undefined,
  [RouteProductClass.TAXI]: undefined,
  [RouteProductClass.CAR]: undefined,
};

/**
 * A leg is a walking leg when it has no transportation or is classed as walking
 */
export function isWalkingLeg(leg: JourneyLeg): boolean {
  return !leg.transportation || WALKING_CLASSES.has(leg.transportation.product.klass);
}

/**
 * First non-walking leg scanning forward (origin side) or in reverse (destination side)
 *
 * @returns undefined for an all-walking itinerary
 */
export function firstNonWalkingLeg(
  legs: readonly JourneyLeg[],
  direction: LegDirection = 'forward'
): JourneyLeg | undefined {
  if (direction === 'forward') {
    return legs.find((leg) => !isWalkingLeg(leg));
  }

  for (let index = legs.length - 1; index >= 0; index--) {
    if (!isWalkingLeg(legs[index])) {
      return legs[index];
    }
  }
  return undefined;
}

/**
 * Number of transfers: non-walking legs minus one.
 * Returns -1 when no leg uses transport.
 */
export function countTransfers(legs: readonly JourneyLeg[]): number {
  return legs.filter((leg) => !isWalkingLeg(leg)).length - 1;
}

/**
 * First ticket for the rider category; undefined means the fare is unavailable
 */
export function selectTicket(
  tickets: readonly JourneyFareTicket[],
  person: PersonCategory
): JourneyFareTicket | undefined {
  return tickets.find((ticket) => ticket.person === person);
}

export function gtfsModeKey(klass: RouteProductClass): GtfsModeKey | undefined {
  return GTFS_MODE_KEYS[klass];
}

export function findRealtimeEntity(
  feed: RealtimeFeed,
  realtimeTripId: string
): VehiclePositionEntity | undefined {
  return feed.entities.find((entity) => entity.trip.tripId === realtimeTripId);
}

/**
 * Render a price with at least two fraction digits ("4.5" → "4.50", "1.234" → "1.234")
 */
export function formatPrice(price: Decimal): string {
  return price.toFixed(Math.max(2, price.decimalPlaces()));
}
