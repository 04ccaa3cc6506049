/**
 * Journey summary
 * Flattens a journey and its realtime match into the attributes a dashboard shows
 */

import { differenceInMilliseconds } from 'date-fns';
import {
  RouteProductClass,
  type Journey,
  type PersonCategory,
} from '../types/trip.js';
import type { JourneyWithRealtime } from '../services/journey-retriever.js';
import { countTransfers, firstNonWalkingLeg, formatPrice, selectTicket } from './journey-utils.js';

const DEFAULT_ICON = 'mdi:clock';

const PRODUCT_CLASS_ICONS: Record<RouteProductClass, string> = {
  [RouteProductClass.TRAIN]: 'mdi:train',
  [RouteProductClass.LIGHT_RAIL]: 'mdi:tram',
  [RouteProductClass.BUS]: 'mdi:bus',
  [RouteProductClass.COACH]: 'mdi:bus',
  [RouteProductClass.FERRY]: 'mdi:ferry',
  [RouteProductClass.SCHOOL_BUS]: 'mdi:bus',
  [RouteProductClass.WALKING]: 'mdi:walk',
  [RouteProductClass.WALKING_FOOTPATH]: 'mdi:walk',
  [RouteProductClass.BICYCLE]: 'mdi:bicycle',
  [RouteProductClass.TAKE_BICYCLE_ON_PUBLIC_TRANSPORT]: 'mdi:bicycle',
  [RouteProductClass.KISS_AND_RIDE]: 'mdi:car',
  [RouteProductClass.PARK_AND_RIDE]: 'mdi:car',
  [RouteProductClass.TAXI]: 'mdi:taxi',
  [RouteProductClass.CAR]: 'mdi:car',
};

export interface JourneySummary {
  due_minutes: number | null;
  origin_stop_id: string | null;
  origin_name: string | null;
  destination_stop_id: string | null;
  destination_name: string | null;
  departure_time_estimated: string | null;
  departure_time_planned: string | null;
  arrival_time_estimated: string | null;
  arrival_time_planned: string | null;
  origin_transport_type: RouteProductClass | null;
  origin_transport_name: string | null;
  origin_line_name: string | null;
  origin_line_name_short: string | null;
  changes: number;
  occupancy: string | null;
  real_time_trip_id: string | null;
  fare_type: PersonCategory;
  fare_price: string | null;
  fares: Record<PersonCategory, string | null>;
  latitude: number | null;
  longitude: number | null;
  icon: string;
}

export function productClassIcon(klass: RouteProductClass | undefined): string {
  return klass === undefined ? DEFAULT_ICON : PRODUCT_CLASS_ICONS[klass];
}

/**
 * Price per rider category as a string, null where the fare is unavailable
 */
export function summarizeFares(journey: Journey): Record<PersonCategory, string | null> {
  const priceFor = (person: PersonCategory): string | null => {
    const ticket = selectTicket(journey.fare.tickets, person);
    return ticket ? formatPrice(ticket.priceBrutto) : null;
  };

  return {
    ADULT: priceFor('ADULT'),
    CHILD: priceFor('CHILD'),
    SCHOLAR: priceFor('SCHOLAR'),
    SENIOR: priceFor('SENIOR'),
  };
}

/**
 * Summarize one journey
 *
 * An all-walking journey has no origin or destination transport leg; its stop,
 * time and line fields are null and its icon is the clock.
 */
export function summarizeJourney(
  { journey, realtime }: JourneyWithRealtime,
  fareType: PersonCategory,
  now: Date
): JourneySummary {
  const originLeg = firstNonWalkingLeg(journey.legs, 'forward');
  const destinationLeg = firstNonWalkingLeg(journey.legs, 'reverse');
  const origin = originLeg?.origin;
  const destination = destinationLeg?.destination;
  const transportation = originLeg?.transportation;

  const departure = origin?.departureTimeEstimated ?? origin?.departureTimePlanned;
  const dueMinutes =
    departure === undefined
      ? null
      : Math.floor(Math.max(differenceInMilliseconds(departure, now) / 60000, 0));

  const fares = summarizeFares(journey);
  const position = realtime?.vehicle.position;

  return {
    due_minutes: dueMinutes,
    origin_stop_id: origin?.id ?? null,
    origin_name: origin?.name ?? null,
    destination_stop_id: destination?.id ?? null,
    destination_name: destination?.name ?? null,
    departure_time_estimated: origin?.departureTimeEstimated?.toISOString() ?? null,
    departure_time_planned: origin?.departureTimePlanned?.toISOString() ?? null,
    arrival_time_estimated: destination?.arrivalTimeEstimated?.toISOString() ?? null,
    arrival_time_planned: destination?.arrivalTimePlanned?.toISOString() ?? null,
    origin_transport_type: transportation?.product.klass ?? null,
    origin_transport_name: transportation ? RouteProductClass[transportation.product.klass] : null,
    origin_line_name: transportation?.number ?? null,
    origin_line_name_short: transportation?.disassembledName ?? null,
    changes: countTransfers(journey.legs),
    // Reported at the alighting stop of the origin leg
    occupancy: originLeg?.destination.properties.occupancy ?? null,
    real_time_trip_id: transportation?.properties.realtimeTripId ?? null,
    fare_type: fareType,
    fare_price: fares[fareType],
    fares,
    latitude: position?.latitude ?? null,
    longitude: position?.longitude ?? null,
    icon: productClassIcon(transportation?.product.klass),
  };
}
