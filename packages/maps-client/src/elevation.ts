import { LatLngSchema, formatLatLngList } from '@wayfarer/domain';
import { z } from 'zod';

import { type MapsClient, parseRequest } from './client';
import { LegacyStatusSchema, checkLegacyStatus } from './legacy-status';

const TITLE = 'Elevation API';

const PositionalRequestSchema = z.object({
  locations: z.array(LatLngSchema).min(1, 'At least one location is required')
});

const SampledPathRequestSchema = z.object({
  path: z.array(LatLngSchema).min(2, 'A path needs at least two points'),
  samples: z.number().int().positive()
});

export const ElevationRequestSchema = z.union([PositionalRequestSchema, SampledPathRequestSchema]);

export type ElevationRequest = z.input<typeof ElevationRequestSchema>;

export const ElevationResultSchema = z
  .object({
    elevation: z.number(),
    location: LatLngSchema,
    resolution: z.number().optional()
  })
  .passthrough();

export const ElevationResponseSchema = LegacyStatusSchema.extend({
  results: z.array(ElevationResultSchema).default([])
}).passthrough();

export type ElevationResult = z.infer<typeof ElevationResultSchema>;
export type ElevationResponse = z.infer<typeof ElevationResponseSchema>;

export const buildElevationQuery = (input: ElevationRequest) => {
  const request = parseRequest(ElevationRequestSchema, input, TITLE);

  if ('locations' in request) {
    return { locations: formatLatLngList(request.locations) };
  }

  return { path: formatLatLngList(request.path), samples: request.samples };
};

export const fetchElevation = async (client: MapsClient, request: ElevationRequest): Promise<ElevationResponse> => {
  const query = buildElevationQuery(request);

  return client.request({
    title: TITLE,
    apis: ['Elevation'],
    service: 'maps',
    path: 'elevation/json',
    query,
    auth: 'query',
    schema: ElevationResponseSchema,
    applicationError: checkLegacyStatus
  });
};
