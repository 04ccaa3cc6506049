/**
 * GTFS-realtime vehicle position decoding
 * Reduces a binary FeedMessage to an immutable RealtimeFeed snapshot
 */

import GtfsRealtimeBindings from 'gtfs-realtime-bindings';
import type { transit_realtime } from 'gtfs-realtime-bindings';
import { MalformedResponseError } from '../errors.js';
import { deepFreeze } from '../utils/freeze.js';
import type { GtfsModeKey } from '../types/trip.js';
import type { RealtimeFeed, VehiclePosition, VehiclePositionEntity } from '../types/realtime.js';

const { FeedMessage } = GtfsRealtimeBindings.transit_realtime;

/**
 * Decode a vehicle position feed for one mode
 *
 * Entities without a vehicle or a trip id cannot be correlated with a journey leg and are dropped.
 *
 * @throws MalformedResponseError if the payload is not a valid FeedMessage
 */
export function decodeRealtimeFeed(
  mode: GtfsModeKey,
  payload: Uint8Array,
  fetchedAt: Date = new Date()
): RealtimeFeed {
  let message: transit_realtime.FeedMessage;

  try {
    message = FeedMessage.decode(payload);
  } catch (error) {
    throw new MalformedResponseError(
      `Realtime feed for ${mode} could not be decoded: ${error instanceof Error ? error.message : String(error)}`,
      [],
      { cause: error }
    );
  }

  const entities: VehiclePositionEntity[] = [];
  for (const entity of message.entity) {
    const converted = toVehiclePositionEntity(entity);
    if (converted) {
      entities.push(converted);
    }
  }

  const feed: RealtimeFeed = { mode, fetchedAt, entities };
  deepFreeze(feed);
  return feed;
}

function toVehiclePositionEntity(
  entity: transit_realtime.IFeedEntity
): VehiclePositionEntity | undefined {
  const vehicle = entity.vehicle;
  const tripId = vehicle?.trip?.tripId;

  if (!vehicle || !tripId) {
    return undefined;
  }

  return {
    id: entity.id,
    trip: {
      tripId,
      routeId: vehicle.trip?.routeId || undefined,
    },
    vehicle: {
      id: vehicle.vehicle?.id || undefined,
      label: vehicle.vehicle?.label || undefined,
      position: vehicle.position ? toPosition(vehicle.position) : undefined,
    },
  };
}

function toPosition(position: transit_realtime.IPosition): VehiclePosition {
  // Decoded messages carry proto defaults on the prototype; only own fields were sent
  return {
    latitude: position.latitude,
    longitude: position.longitude,
    bearing: Object.hasOwn(position, 'bearing') ? position.bearing ?? undefined : undefined,
    speed: Object.hasOwn(position, 'speed') ? position.speed ?? undefined : undefined,
  };
}
