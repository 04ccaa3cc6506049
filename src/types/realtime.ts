/**
 * GTFS-realtime vehicle position types
 * Snapshot of a decoded FeedMessage, reduced to the fields used for trip correlation
 */

import type { GtfsModeKey } from './trip.js';

export interface VehiclePosition {
  readonly latitude: number;
  readonly longitude: number;
  readonly bearing?: number;
  readonly speed?: number; // Metres per second
}

export interface VehiclePositionEntity {
  readonly id: string;
  readonly trip: {
    readonly tripId: string;
    readonly routeId?: string;
  };
  readonly vehicle: {
    readonly id?: string;
    readonly label?: string;
    readonly position?: VehiclePosition;
  };
}

export interface RealtimeFeed {
  readonly mode: GtfsModeKey;
  readonly fetchedAt: Date;
  readonly entities: readonly VehiclePositionEntity[];
}
