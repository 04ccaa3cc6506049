/**
 * Trip planner (EFA rapidJSON) types
 * Normalized shape of a trip request response, as produced by parseTripResponse()
 *
 * All model objects are frozen once parsed; a newer fetch replaces them.
 */

import type { Decimal } from 'decimal.js';

/**
 * Transport classification of a route product (`product.class` on the wire)
 */
export enum RouteProductClass {
  TRAIN = 1,
  LIGHT_RAIL = 4,
  BUS = 5,
  COACH = 7,
  FERRY = 9,
  SCHOOL_BUS = 11,
  WALKING = 99,
  WALKING_FOOTPATH = 100,
  BICYCLE = 101,
  TAKE_BICYCLE_ON_PUBLIC_TRANSPORT = 102,
  KISS_AND_RIDE = 103,
  PARK_AND_RIDE = 104,
  TAXI = 105,
  CAR = 106,
}

export const MODES_OF_TRANSPORT = ['train', 'light_rail', 'bus', 'coach', 'ferry', 'school_bus'] as const;

export type ModeOfTransport = (typeof MODES_OF_TRANSPORT)[number];

export const PERSON_CATEGORIES = ['ADULT', 'CHILD', 'SCHOLAR', 'SENIOR'] as const;

export type PersonCategory = (typeof PERSON_CATEGORIES)[number];

/** Realtime feed endpoint names, one per mode */
export type GtfsModeKey = 'buses' | 'ferries' | 'lightrail' | 'sydneytrains';

export type InfoPriority = 'veryLow' | 'low' | 'normal' | 'high' | 'veryHigh';

export interface JourneyFareTicket {
  readonly id: string;
  readonly name: string;
  readonly comment: string;
  readonly person: PersonCategory;
  readonly priceLevel?: string;
  readonly priceBrutto: Decimal;
}

export interface Fare {
  readonly tickets: readonly JourneyFareTicket[];
  readonly zones?: readonly unknown[];
}

export interface JourneyLegInfo {
  readonly id: string;
  readonly version: number;
  readonly priority: InfoPriority;
  readonly urlText?: string;
  readonly url?: string;
  readonly content?: string;
  readonly subtitle?: string;
  readonly timestamps?: {
    readonly creation: Date;
    readonly lastModification: Date;
  };
}

export interface JourneyLegStop {
  readonly id: string;
  readonly name: string;
  readonly disassembledName?: string;
  readonly type: string;
  readonly departureTimeEstimated?: Date;
  readonly departureTimePlanned?: Date;
  readonly arrivalTimeEstimated?: Date;
  readonly arrivalTimePlanned?: Date;
  readonly properties: {
    readonly occupancy?: string;
  };
}

export interface RouteProduct {
  readonly name: string;
  readonly klass: RouteProductClass;
  readonly iconId: number;
}

export interface TripTransportation {
  readonly id?: string;
  readonly name?: string;
  readonly disassembledName?: string; // Short line label, e.g. "T1"
  readonly number?: string;
  readonly iconId?: number;
  readonly description?: string;
  readonly product: RouteProduct;
  readonly properties: {
    /** Join key into the GTFS-realtime vehicle position feed */
    readonly realtimeTripId?: string;
  };
}

export interface JourneyLeg {
  readonly duration: number; // Seconds
  readonly distance?: number;
  readonly isRealtimeControlled?: boolean;
  readonly origin: JourneyLegStop;
  readonly destination: JourneyLegStop;
  readonly transportation?: TripTransportation;
  readonly infos: readonly JourneyLegInfo[];
}

export interface Journey {
  readonly rating?: number;
  readonly isAdditional: number;
  readonly legs: readonly JourneyLeg[];
  readonly fare: Fare;
}

export interface TripRequestResponse {
  readonly version: string;
  readonly journeys: readonly Journey[];
}
