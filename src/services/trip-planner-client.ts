/**
 * Transport for NSW Trip Planner client
 * Queries the EFA trip endpoint and the GTFS-realtime vehicle position feeds
 *
 * Both endpoints authenticate with an `Authorization: apikey <key>` header.
 */

import axios, { type AxiosInstance } from 'axios';
import { format } from 'date-fns';
import { ConfigurationError, UpstreamError } from '../errors.js';
import {
  MODES_OF_TRANSPORT,
  type GtfsModeKey,
  type ModeOfTransport,
  type TripRequestResponse,
} from '../types/trip.js';
import type { RealtimeFeed } from '../types/realtime.js';
import { parseTripResponseText } from './trip-response.js';
import { decodeRealtimeFeed } from './realtime-feed.js';

export const DEFAULT_BASE_URL = 'https://api.transport.nsw.gov.au/v1';
export const DEFAULT_TIMEOUT_MS = 10000;

const API_VERSION = '10.2.1.42';

/**
 * Mode → exclusion parameter. The trip endpoint only accepts exclusions,
 * so an inclusion list is sent as its complement.
 */
const EXCLUDED_MODE_PARAMS: Record<ModeOfTransport, string> = {
  train: 'exclMOT_1',
  light_rail: 'exclMOT_4',
  bus: 'exclMOT_5',
  coach: 'exclMOT_7',
  ferry: 'exclMOT_9',
  school_bus: 'exclMOT_11',
};

export interface TripQuery {
  origin: string;
  destination: string;
  numJourneys?: number;
  departAt?: Date;
  arriveBy?: Date;
  includeModes?: readonly ModeOfTransport[];
  excludeModes?: readonly ModeOfTransport[];
}

export interface TripPlanner {
  queryTrip(query: TripQuery, correlationId?: string): Promise<TripRequestResponse>;
}

export interface RealtimeFeedSource {
  fetchRealtimeFeed(mode: GtfsModeKey): Promise<RealtimeFeed>;
}

export interface TripPlannerClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Clock used when neither departAt nor arriveBy is given */
  now?: () => Date;
}

/**
 * Exclusion parameters for a mode filter
 *
 * @throws ConfigurationError if both an inclusion and an exclusion list are given
 */
export function buildExcludedModeParams(
  includeModes?: readonly ModeOfTransport[],
  excludeModes?: readonly ModeOfTransport[]
): Record<string, string> {
  if (includeModes !== undefined && excludeModes !== undefined) {
    throw new ConfigurationError('Unable to specify both includeModes and excludeModes');
  }

  let excluded: readonly ModeOfTransport[];
  if (includeModes !== undefined && includeModes.length > 0) {
    excluded = MODES_OF_TRANSPORT.filter((mode) => !includeModes.includes(mode));
  } else if (excludeModes !== undefined) {
    excluded = excludeModes;
  } else {
    return {};
  }

  const params: Record<string, string> = { excludedMeans: 'checkbox' };
  for (const mode of excluded) {
    params[EXCLUDED_MODE_PARAMS[mode]] = '1';
  }
  return params;
}

/**
 * Query parameters for a trip request
 *
 * Date and time are formatted in the process's local time zone.
 *
 * @throws ConfigurationError for mutually exclusive or out-of-range parameters
 */
export function buildTripQueryParams(query: TripQuery, now: Date): Record<string, string> {
  if (query.departAt !== undefined && query.arriveBy !== undefined) {
    throw new ConfigurationError('Unable to specify both departAt and arriveBy');
  }

  const numJourneys = query.numJourneys ?? 1;
  if (!Number.isInteger(numJourneys) || numJourneys < 1) {
    throw new ConfigurationError(`numJourneys must be a positive integer, got ${numJourneys}`);
  }

  const excludedModeParams = buildExcludedModeParams(query.includeModes, query.excludeModes);
  const itd = query.departAt ?? query.arriveBy ?? now;

  return {
    outputFormat: 'rapidJSON',
    depArrMacro: query.arriveBy !== undefined ? 'arr' : 'dep',
    itdDate: format(itd, 'yyyyMMdd'),
    itdTime: format(itd, 'HHmm'),
    type_origin: 'any',
    type_destination: 'any',
    name_origin: query.origin,
    name_destination: query.destination,
    calcNumberOfTrips: String(numJourneys),
    version: API_VERSION,
    TfNSWTR: 'true',
    ...excludedModeParams,
  };
}

export class TripPlannerClient implements TripPlanner, RealtimeFeedSource {
  private axiosClient: AxiosInstance;
  private now: () => Date;
  private timeoutMs: number;

  constructor(options: TripPlannerClientOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('apiKey is required');
    }

    this.now = options.now ?? (() => new Date());
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.axiosClient = axios.create({
      baseURL: options.baseUrl ?? DEFAULT_BASE_URL,
      // Idle timeout only; each request also carries an overall deadline signal
      timeout: this.timeoutMs,
      headers: {
        Authorization: `apikey ${options.apiKey}`,
      },
    });
  }

  /**
   * Query upcoming journeys between two stops
   *
   * Parameters are validated before any request is sent.
   *
   * @param correlationId - Optional correlation ID forwarded as X-Correlation-ID
   * @throws ConfigurationError, UpstreamError, MalformedResponseError
   */
  async queryTrip(query: TripQuery, correlationId?: string): Promise<TripRequestResponse> {
    const params = buildTripQueryParams(query, this.now());

    const headers: Record<string, string> = {};
    if (correlationId) {
      headers['X-Correlation-ID'] = correlationId;
    }

    let body: string;
    try {
      // Kept as text so fare prices can be parsed without float rounding
      const response = await this.axiosClient.get<string>('/tp/trip', {
        params,
        headers,
        responseType: 'text',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = response.data;
    } catch (error) {
      throw toUpstreamError(error, 'Trip planner', this.timeoutMs);
    }

    return parseTripResponseText(body);
  }

  /**
   * Fetch and decode the vehicle position feed for one mode.
   * Expensive: callers go through RealtimeFeedCache.
   *
   * @throws UpstreamError, MalformedResponseError
   */
  async fetchRealtimeFeed(mode: GtfsModeKey): Promise<RealtimeFeed> {
    let payload: ArrayBuffer;
    try {
      const response = await this.axiosClient.get<ArrayBuffer>(`/gtfs/vehiclepos/${mode}`, {
        responseType: 'arraybuffer',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      payload = response.data;
    } catch (error) {
      throw toUpstreamError(error, `Realtime feed (${mode})`, this.timeoutMs);
    }

    return decodeRealtimeFeed(mode, new Uint8Array(payload), this.now());
  }
}

/**
 * Map a failed request onto UpstreamError, keeping the HTTP status when there was one
 */
function toUpstreamError(error: unknown, service: string, timeoutMs: number): UpstreamError {
  // Aborted by the deadline signal
  if (axios.isCancel(error)) {
    return new UpstreamError(`${service} timeout: no complete response within ${timeoutMs}ms`, undefined, {
      cause: error,
    });
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      return new UpstreamError(
        `${service} returned HTTP ${error.response.status}`,
        error.response.status,
        { cause: error }
      );
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.message.includes('timeout')) {
      return new UpstreamError(`${service} timeout: ${error.message}`, undefined, { cause: error });
    }
    return new UpstreamError(`${service} unavailable: ${error.message}`, undefined, { cause: error });
  }

  return new UpstreamError(
    `${service} request failed: ${error instanceof Error ? error.message : String(error)}`,
    undefined,
    { cause: error }
  );
}
