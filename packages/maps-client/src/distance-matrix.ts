import { z } from 'zod';

import { type MapsClient, parseRequest } from './client';
import { LegacyStatusSchema, checkLegacyStatus } from './legacy-status';
import {
  AvoidSchema,
  DepartureTimeSchema,
  PlaceSchema,
  TextValueSchema,
  TrafficModelSchema,
  TravelModeSchema,
  UnitSystemSchema,
  formatAvoid,
  formatDepartureTime,
  formatPlace
} from './travel';

const TITLE = 'Distance Matrix API';
const MAX_PLACES_PER_SIDE = 25;

export const DistanceMatrixRequestSchema = z.object({
  origins: z.array(PlaceSchema).min(1).max(MAX_PLACES_PER_SIDE),
  destinations: z.array(PlaceSchema).min(1).max(MAX_PLACES_PER_SIDE),
  mode: TravelModeSchema.optional(),
  units: UnitSystemSchema.optional(),
  avoid: z.array(AvoidSchema).optional(),
  departureTime: DepartureTimeSchema.optional(),
  trafficModel: TrafficModelSchema.optional(),
  language: z.string().min(2).optional(),
  region: z.string().length(2).optional()
});

export type DistanceMatrixRequest = z.input<typeof DistanceMatrixRequestSchema>;

/**
 * Per-pair result. `status` is `OK`, `NOT_FOUND`, `ZERO_RESULTS` or `MAX_ROUTE_LENGTH_EXCEEDED`; a failed
 * element does not fail the whole call.
 */
export const DistanceMatrixElementSchema = z
  .object({
    status: z.string(),
    distance: TextValueSchema.optional(),
    duration: TextValueSchema.optional(),
    duration_in_traffic: TextValueSchema.optional()
  })
  .passthrough();

export const DistanceMatrixResponseSchema = LegacyStatusSchema.extend({
  origin_addresses: z.array(z.string()).default([]),
  destination_addresses: z.array(z.string()).default([]),
  rows: z.array(z.object({ elements: z.array(DistanceMatrixElementSchema) })).default([])
}).passthrough();

export type DistanceMatrixElement = z.infer<typeof DistanceMatrixElementSchema>;
export type DistanceMatrixResponse = z.infer<typeof DistanceMatrixResponseSchema>;

export const buildDistanceMatrixQuery = (input: DistanceMatrixRequest) => {
  const request = parseRequest(DistanceMatrixRequestSchema, input, TITLE);

  return {
    origins: request.origins.map(formatPlace).join('|'),
    destinations: request.destinations.map(formatPlace).join('|'),
    mode: request.mode,
    units: request.units,
    avoid: formatAvoid(request.avoid),
    departure_time: request.departureTime === undefined ? undefined : formatDepartureTime(request.departureTime),
    traffic_model: request.trafficModel,
    language: request.language,
    region: request.region
  };
};

export const fetchDistanceMatrix = async (
  client: MapsClient,
  request: DistanceMatrixRequest
): Promise<DistanceMatrixResponse> => {
  const query = buildDistanceMatrixQuery(request);

  return client.request({
    title: TITLE,
    apis: ['DistanceMatrix'],
    service: 'maps',
    path: 'distancematrix/json',
    query,
    auth: 'query',
    schema: DistanceMatrixResponseSchema,
    applicationError: checkLegacyStatus
  });
};
