import { LatLngSchema, formatLatLng } from '@wayfarer/domain';
import { z } from 'zod';

import { type MapsClient, parseRequest } from './client';
import { checkLegacyStatus } from './legacy-status';
import { toUnixSeconds } from './travel';

const TITLE = 'Time Zone API';

export const TimeZoneRequestSchema = z.object({
  location: LatLngSchema,
  /** Instant used to decide whether daylight saving applies. */
  timestamp: z.date(),
  language: z.string().min(2).optional()
});

export type TimeZoneRequest = z.input<typeof TimeZoneRequestSchema>;

// This API reports errors as `errorMessage`, unlike the other legacy services.
export const TimeZoneResponseSchema = z
  .object({
    status: z.string(),
    errorMessage: z.string().optional(),
    dstOffset: z.number().optional(),
    rawOffset: z.number().optional(),
    timeZoneId: z.string().optional(),
    timeZoneName: z.string().optional()
  })
  .passthrough();

export type TimeZoneResponse = z.infer<typeof TimeZoneResponseSchema>;

export const buildTimeZoneQuery = (input: TimeZoneRequest) => {
  const request = parseRequest(TimeZoneRequestSchema, input, TITLE);

  return {
    location: formatLatLng(request.location),
    timestamp: toUnixSeconds(request.timestamp),
    language: request.language
  };
};

export const fetchTimeZone = async (client: MapsClient, request: TimeZoneRequest): Promise<TimeZoneResponse> => {
  const query = buildTimeZoneQuery(request);

  return client.request({
    title: TITLE,
    apis: ['TimeZone'],
    service: 'maps',
    path: 'timezone/json',
    query,
    auth: 'query',
    schema: TimeZoneResponseSchema,
    applicationError: (body) => checkLegacyStatus({ status: body.status, error_message: body.errorMessage })
  });
};
