/**
 * Trip response parsing
 * Validates an EFA rapidJSON trip response once, at parse time, and maps it
 * onto the TripRequestResponse model.
 *
 * The raw body is parsed with lossless-json so that fare prices keep their
 * exact decimal text ("4.50" stays "4.50") instead of passing through a float.
 */

import { parse as parseLosslessJson, isLosslessNumber } from 'lossless-json';
import { Decimal } from 'decimal.js';
import { z } from 'zod';
import { MalformedResponseError } from '../errors.js';
import { deepFreeze } from '../utils/freeze.js';
import {
  PERSON_CATEGORIES,
  RouteProductClass,
  type TripRequestResponse,
} from '../types/trip.js';

const DECIMAL_FIELDS = new Set(['priceBrutto']);

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const optionalInteger = z
  .number()
  .int()
  .nullish()
  .transform((value) => value ?? undefined);

const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const optionalTimestamp = timestamp.nullish().transform((value) => value ?? undefined);

const decimalAmount = z.union([z.string(), z.number()]).transform((value, ctx) => {
  try {
    return new Decimal(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid decimal amount "${String(value)}": ${error instanceof Error ? error.message : String(error)}`,
    });
    return z.NEVER;
  }
});

const fareTicketSchema = z.object({
  id: z.string(),
  name: z.string(),
  comment: z.string(),
  person: z.enum(PERSON_CATEGORIES),
  priceLevel: optionalString,
  priceBrutto: decimalAmount,
});

const fareSchema = z.object({
  tickets: z.array(fareTicketSchema),
  zones: z
    .array(z.unknown())
    .nullish()
    .transform((value) => value ?? undefined),
});

const legInfoSchema = z.object({
  id: z.string(),
  version: z.number().int(),
  priority: z.enum(['veryLow', 'low', 'normal', 'high', 'veryHigh']),
  urlText: optionalString,
  url: optionalString,
  content: optionalString,
  subtitle: optionalString,
  timestamps: z
    .object({
      creation: timestamp,
      lastModification: timestamp,
    })
    .nullish()
    .transform((value) => value ?? undefined),
});

const legStopSchema = z.object({
  id: z.string(),
  name: z.string(),
  disassembledName: optionalString,
  type: z.string(),
  departureTimeEstimated: optionalTimestamp,
  departureTimePlanned: optionalTimestamp,
  arrivalTimeEstimated: optionalTimestamp,
  arrivalTimePlanned: optionalTimestamp,
  properties: z
    .object({
      occupancy: optionalString,
    })
    .default({}),
});

const routeProductSchema = z
  .object({
    name: z.string(),
    class: z.nativeEnum(RouteProductClass),
    iconId: z.number().int(),
  })
  .transform(({ class: klass, ...product }) => ({ ...product, klass }));

const transportationSchema = z.object({
  id: optionalString,
  name: optionalString,
  disassembledName: optionalString,
  number: optionalString,
  iconId: optionalInteger,
  description: optionalString,
  product: routeProductSchema,
  properties: z
    .object({
      RealtimeTripId: optionalString,
    })
    .default({})
    .transform((properties) => ({ realtimeTripId: properties.RealtimeTripId })),
});

const journeyLegSchema = z.object({
  duration: z.number().int(),
  distance: optionalInteger,
  isRealtimeControlled: z
    .boolean()
    .nullish()
    .transform((value) => value ?? undefined),
  origin: legStopSchema,
  destination: legStopSchema,
  transportation: transportationSchema.nullish().transform((value) => value ?? undefined),
  infos: z
    .array(legInfoSchema)
    .nullish()
    .transform((value) => value ?? []),
});

const journeySchema = z.object({
  rating: optionalInteger,
  // rapidJSON sends a boolean; older versions sent 0/1
  isAdditional: z.union([z.number().int(), z.boolean()]).transform((value) => Number(value)),
  legs: z.array(journeyLegSchema).min(1, 'journey must have at least one leg'),
  fare: fareSchema,
});

export const tripRequestResponseSchema = z.object({
  version: z.string(),
  journeys: z.array(journeySchema),
});

/**
 * Validate an already-decoded response body
 *
 * @throws MalformedResponseError if any required field is missing or an enumeration value is unknown
 */
export function parseTripResponse(body: unknown): TripRequestResponse {
  const result = tripRequestResponseSchema.safeParse(body);

  if (!result.success) {
    const summary = result.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new MalformedResponseError(`Trip response failed validation: ${summary}`, result.error.issues);
  }

  const response: TripRequestResponse = result.data;
  deepFreeze(response);
  return response;
}

/**
 * Parse the raw JSON text of a trip response
 * Numbers become plain numbers, except decimal fields which keep their source text.
 */
export function parseTripResponseText(text: string): TripRequestResponse {
  let body: unknown;

  try {
    body = parseLosslessJson(text, (key: string, value: unknown): unknown => {
      if (!isLosslessNumber(value)) {
        return value;
      }
      return DECIMAL_FIELDS.has(key) ? value.value : Number(value.value);
    });
  } catch (error) {
    throw new MalformedResponseError(
      `Trip response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      [],
      { cause: error }
    );
  }

  return parseTripResponse(body);
}
