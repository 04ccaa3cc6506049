/**
 * Service configuration
 * Environment variables and the trips file, both validated with zod
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { MODES_OF_TRANSPORT, PERSON_CATEGORIES } from '../types/trip.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from '../services/trip-planner-client.js';

const envSchema = z.object({
  TFNSW_API_KEY: z.string().min(1, 'TFNSW_API_KEY is required'),
  TFNSW_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().min(1).default('journey-tracker'),
  TRIPS_FILE: z.string().min(1).default('config/trips.json'),
});

export const tripDefinitionSchema = z.object({
  name: z.string().min(1, 'name is required'),
  originStopId: z.string().min(1, 'originStopId is required'),
  destinationStopId: z.string().min(1, 'destinationStopId is required'),
  numJourneys: z.number().int().min(1).default(1),
  fareType: z.enum(PERSON_CATEGORIES).default('ADULT'),
  modesOfTransport: z.array(z.enum(MODES_OF_TRANSPORT)).optional(),
});

const tripsFileSchema = z
  .object({
    trips: z.array(tripDefinitionSchema).min(1, 'at least one trip is required'),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.trips.forEach((trip, index) => {
      if (seen.has(trip.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['trips', index, 'name'],
          message: `duplicate trip name "${trip.name}"`,
        });
      }
      seen.add(trip.name);
    });
  });

export type TripDefinition = z.infer<typeof tripDefinitionSchema>;

export interface ServiceConfig {
  apiKey: string;
  baseUrl: string;
  httpTimeoutMs: number;
  port: number;
  logLevel: string;
  serviceName: string;
  tripsFile: string;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * @throws ConfigurationError if a variable is missing or invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(`Invalid environment: ${describeIssues(result.error)}`);
  }

  const vars = result.data;
  return {
    apiKey: vars.TFNSW_API_KEY,
    baseUrl: vars.TFNSW_BASE_URL,
    httpTimeoutMs: vars.HTTP_TIMEOUT_MS,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    serviceName: vars.SERVICE_NAME,
    tripsFile: vars.TRIPS_FILE,
  };
}

/**
 * Validate the contents of a trips file
 *
 * @throws ConfigurationError if a trip is invalid or two trips share a name
 */
export function parseTripDefinitions(value: unknown): TripDefinition[] {
  const result = tripsFileSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid trips configuration: ${describeIssues(result.error)}`);
  }
  return result.data.trips;
}

export function loadTripDefinitions(path: string): TripDefinition[] {
  let contents: unknown;
  try {
    contents = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Unable to read trips file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
  return parseTripDefinitions(contents);
}
