import { BoundsSchema, LatLngSchema, formatBounds, formatLatLng, normalizeAddress } from '@wayfarer/domain';
import { z } from 'zod';

import { type MapsClient, parseRequest } from './client';
import { LegacyStatusSchema, checkLegacyStatus } from './legacy-status';

const TITLE = 'Geocoding API';
const PATH = 'geocode/json';

export const LocationTypeSchema = z.enum(['ROOFTOP', 'RANGE_INTERPOLATED', 'GEOMETRIC_CENTER', 'APPROXIMATE']);

export const GeocodingRequestSchema = z
  .object({
    address: z.string().min(1).optional(),
    /** Component filters such as `{ country: 'JP', postal_code: '100-0005' }`. */
    components: z.record(z.string().min(1)).optional(),
    placeId: z.string().min(1).optional(),
    bounds: BoundsSchema.optional(),
    region: z.string().length(2).optional(),
    language: z.string().min(2).optional()
  })
  .refine(
    (request) =>
      request.address !== undefined ||
      request.placeId !== undefined ||
      Object.keys(request.components ?? {}).length > 0,
    { message: 'One of address, components or placeId is required' }
  );

export const ReverseGeocodingRequestSchema = z.object({
  latlng: LatLngSchema,
  resultTypes: z.array(z.string().min(1)).optional(),
  locationTypes: z.array(LocationTypeSchema).optional(),
  language: z.string().min(2).optional()
});

export type GeocodingRequest = z.input<typeof GeocodingRequestSchema>;
export type ReverseGeocodingRequest = z.input<typeof ReverseGeocodingRequestSchema>;

export const GeocodingResultSchema = z
  .object({
    formatted_address: z.string().optional(),
    place_id: z.string().optional(),
    types: z.array(z.string()).default([]),
    geometry: z
      .object({
        location: LatLngSchema,
        location_type: z.string().optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

export const GeocodingResponseSchema = LegacyStatusSchema.extend({
  results: z.array(GeocodingResultSchema).default([])
}).passthrough();

export type GeocodingResult = z.infer<typeof GeocodingResultSchema>;
export type GeocodingResponse = z.infer<typeof GeocodingResponseSchema>;

const formatComponents = (components: Record<string, string> | undefined): string | undefined => {
  const entries = Object.entries(components ?? {});
  return entries.length > 0 ? entries.map(([name, value]) => `${name}:${value}`).join('|') : undefined;
};

const joinPipe = (values: readonly string[] | undefined): string | undefined =>
  values && values.length > 0 ? values.join('|') : undefined;

export const buildGeocodingQuery = (input: GeocodingRequest) => {
  const request = parseRequest(GeocodingRequestSchema, input, TITLE);

  return {
    address: request.address === undefined ? undefined : normalizeAddress(request.address),
    components: formatComponents(request.components),
    place_id: request.placeId,
    bounds: request.bounds ? formatBounds(request.bounds) : undefined,
    region: request.region,
    language: request.language
  };
};

export const buildReverseGeocodingQuery = (input: ReverseGeocodingRequest) => {
  const request = parseRequest(ReverseGeocodingRequestSchema, input, TITLE);

  return {
    latlng: formatLatLng(request.latlng),
    result_type: joinPipe(request.resultTypes),
    location_type: joinPipe(request.locationTypes),
    language: request.language
  };
};

/**
 * Forward geocoding: address, component filters or place ID to coordinates.
 */
export const fetchGeocode = async (client: MapsClient, request: GeocodingRequest): Promise<GeocodingResponse> => {
  const query = buildGeocodingQuery(request);

  return client.request({
    title: TITLE,
    apis: ['Geocoding'],
    service: 'maps',
    path: PATH,
    query,
    auth: 'query',
    schema: GeocodingResponseSchema,
    applicationError: checkLegacyStatus
  });
};

export const fetchReverseGeocode = async (
  client: MapsClient,
  request: ReverseGeocodingRequest
): Promise<GeocodingResponse> => {
  const query = buildReverseGeocodingQuery(request);

  return client.request({
    title: TITLE,
    apis: ['Geocoding'],
    service: 'maps',
    path: PATH,
    query,
    auth: 'query',
    schema: GeocodingResponseSchema,
    applicationError: checkLegacyStatus
  });
};
