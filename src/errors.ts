/**
 * Error taxonomy for trip retrieval
 *
 * - ConfigurationError: invalid or mutually exclusive request parameters (caller bug, never retried)
 * - UpstreamError: non-2xx HTTP status, timeout or network failure (caller may retry on its own schedule)
 * - MalformedResponseError: body failed schema validation or binary decoding
 *
 * "Not found" outcomes (no non-walking leg, no realtime match, no fare ticket)
 * are returned as undefined, never thrown.
 */

import type { ZodIssue } from 'zod';

export type TripTrackerErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'UPSTREAM_ERROR'
  | 'MALFORMED_RESPONSE';

export abstract class TripTrackerError extends Error {
  abstract readonly code: TripTrackerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends TripTrackerError {
  readonly code = 'CONFIGURATION_ERROR';
}

export class UpstreamError extends TripTrackerError {
  readonly code = 'UPSTREAM_ERROR';

  /** HTTP status returned upstream; undefined for timeouts and network failures */
  readonly statusCode: number | undefined;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.statusCode = statusCode;
  }
}

export class MalformedResponseError extends TripTrackerError {
  readonly code = 'MALFORMED_RESPONSE';

  readonly issues: readonly ZodIssue[];

  constructor(message: string, issues: readonly ZodIssue[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.issues = issues;
  }
}
