import { z } from 'zod';

import { type MapsClient, parseRequest } from './client';
import { LegacyStatusSchema, checkLegacyStatus } from './legacy-status';
import {
  AvoidSchema,
  DepartureTimeSchema,
  PlaceSchema,
  TextValueSchema,
  TravelModeSchema,
  UnitSystemSchema,
  formatAvoid,
  formatDepartureTime,
  formatPlace,
  toUnixSeconds
} from './travel';

const TITLE = 'Directions API';

export const DirectionsRequestSchema = z
  .object({
    origin: PlaceSchema,
    destination: PlaceSchema,
    waypoints: z.array(PlaceSchema).max(25).optional(),
    /** Let Google reorder the waypoints; see `waypoint_order` in the response. */
    optimizeWaypoints: z.boolean().optional(),
    mode: TravelModeSchema.optional(),
    alternatives: z.boolean().optional(),
    avoid: z.array(AvoidSchema).optional(),
    units: UnitSystemSchema.optional(),
    departureTime: DepartureTimeSchema.optional(),
    arrivalTime: z.date().optional(),
    language: z.string().min(2).optional(),
    region: z.string().length(2).optional()
  })
  .refine((request) => request.departureTime === undefined || request.arrivalTime === undefined, {
    message: 'departureTime and arrivalTime cannot both be set',
    path: ['arrivalTime']
  });

export type DirectionsRequest = z.input<typeof DirectionsRequestSchema>;

export const DirectionsLegSchema = z
  .object({
    start_address: z.string().optional(),
    end_address: z.string().optional(),
    distance: TextValueSchema.optional(),
    duration: TextValueSchema.optional()
  })
  .passthrough();

export const DirectionsRouteSchema = z
  .object({
    summary: z.string().optional(),
    legs: z.array(DirectionsLegSchema).default([]),
    waypoint_order: z.array(z.number().int()).default([])
  })
  .passthrough();

export const DirectionsResponseSchema = LegacyStatusSchema.extend({
  routes: z.array(DirectionsRouteSchema).default([]),
  geocoded_waypoints: z.array(z.object({ geocoder_status: z.string().optional() }).passthrough()).default([])
}).passthrough();

export type DirectionsRoute = z.infer<typeof DirectionsRouteSchema>;
export type DirectionsResponse = z.infer<typeof DirectionsResponseSchema>;

const formatWaypoints = (waypoints: string[], optimize: boolean | undefined): string | undefined => {
  if (waypoints.length === 0) {
    return undefined;
  }
  return (optimize ? ['optimize:true', ...waypoints] : waypoints).join('|');
};

export const buildDirectionsQuery = (input: DirectionsRequest) => {
  const request = parseRequest(DirectionsRequestSchema, input, TITLE);

  return {
    origin: formatPlace(request.origin),
    destination: formatPlace(request.destination),
    waypoints: formatWaypoints((request.waypoints ?? []).map(formatPlace), request.optimizeWaypoints),
    mode: request.mode,
    alternatives: request.alternatives,
    avoid: formatAvoid(request.avoid),
    units: request.units,
    departure_time: request.departureTime === undefined ? undefined : formatDepartureTime(request.departureTime),
    arrival_time: request.arrivalTime === undefined ? undefined : toUnixSeconds(request.arrivalTime),
    language: request.language,
    region: request.region
  };
};

export const fetchDirections = async (client: MapsClient, request: DirectionsRequest): Promise<DirectionsResponse> => {
  const query = buildDirectionsQuery(request);

  return client.request({
    title: TITLE,
    apis: ['Directions'],
    service: 'maps',
    path: 'directions/json',
    query,
    auth: 'query',
    schema: DirectionsResponseSchema,
    applicationError: checkLegacyStatus
  });
};
