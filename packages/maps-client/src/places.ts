import { LatLngSchema, formatLatLng } from '@wayfarer/domain';
import { z } from 'zod';

import { type MapsClient, parseRequest } from './client';
import { LegacyStatusSchema, checkLegacyStatus } from './legacy-status';

const TITLE = 'Places API';

const PriceLevelSchema = z.number().int().min(0).max(4);
const RadiusSchema = z.number().positive().max(50_000);

export const LegacyTextSearchRequestSchema = z.object({
  query: z.string().min(1, 'query must not be empty'),
  location: LatLngSchema.optional(),
  radius: RadiusSchema.optional(),
  type: z.string().min(1).optional(),
  language: z.string().min(2).optional(),
  region: z.string().length(2).optional(),
  minPrice: PriceLevelSchema.optional(),
  maxPrice: PriceLevelSchema.optional(),
  openNow: z.boolean().optional(),
  pageToken: z.string().min(1).optional()
});

/**
 * `rankBy: 'distance'` replaces the radius and needs a keyword or type to rank against.
 */
export const LegacyNearbySearchRequestSchema = z
  .object({
    location: LatLngSchema,
    radius: RadiusSchema.optional(),
    rankBy: z.enum(['prominence', 'distance']).optional(),
    keyword: z.string().min(1).optional(),
    type: z.string().min(1).optional(),
    language: z.string().min(2).optional(),
    minPrice: PriceLevelSchema.optional(),
    maxPrice: PriceLevelSchema.optional(),
    openNow: z.boolean().optional(),
    pageToken: z.string().min(1).optional()
  })
  .refine((request) => (request.rankBy === 'distance') === (request.radius === undefined), {
    message: 'radius is required unless ranking by distance, and not allowed when ranking by distance',
    path: ['radius']
  })
  .refine((request) => request.rankBy !== 'distance' || request.keyword !== undefined || request.type !== undefined, {
    message: 'Ranking by distance needs a keyword or type',
    path: ['rankBy']
  });

export const LegacyPlaceDetailsRequestSchema = z.object({
  placeId: z.string().min(1, 'placeId must not be empty'),
  /** Basic, contact and atmosphere fields, e.g. `['name', 'formatted_address']`. Omitted returns all. */
  fields: z.array(z.string().min(1)).min(1).optional(),
  language: z.string().min(2).optional(),
  region: z.string().length(2).optional(),
  sessionToken: z.string().min(1).optional(),
  reviewsSort: z.enum(['most_relevant', 'newest']).optional(),
  reviewsNoTranslations: z.boolean().optional()
});

export const LegacyPlaceAutocompleteRequestSchema = z.object({
  input: z.string().min(1, 'input must not be empty'),
  /** Countries to restrict results to, as ISO 3166-1 alpha-2 codes. */
  components: z.array(z.string().length(2)).max(5).optional(),
  types: z.array(z.string().min(1)).min(1).optional(),
  location: LatLngSchema.optional(),
  radius: RadiusSchema.optional(),
  strictBounds: z.boolean().optional(),
  origin: LatLngSchema.optional(),
  offset: z.number().int().nonnegative().optional(),
  language: z.string().min(2).optional(),
  region: z.string().length(2).optional(),
  sessionToken: z.string().min(1).optional()
});

export type LegacyTextSearchRequest = z.input<typeof LegacyTextSearchRequestSchema>;
export type LegacyNearbySearchRequest = z.input<typeof LegacyNearbySearchRequestSchema>;
export type LegacyPlaceDetailsRequest = z.input<typeof LegacyPlaceDetailsRequestSchema>;
export type LegacyPlaceAutocompleteRequest = z.input<typeof LegacyPlaceAutocompleteRequestSchema>;

export const LegacyPlaceSchema = z
  .object({
    place_id: z.string().optional(),
    name: z.string().optional(),
    formatted_address: z.string().optional(),
    vicinity: z.string().optional(),
    business_status: z.string().optional(),
    rating: z.number().optional(),
    types: z.array(z.string()).default([]),
    geometry: z.object({ location: LatLngSchema }).passthrough().optional()
  })
  .passthrough();

export const LegacyPlaceSearchResponseSchema = LegacyStatusSchema.extend({
  results: z.array(LegacyPlaceSchema).default([]),
  next_page_token: z.string().optional(),
  html_attributions: z.array(z.string()).default([])
}).passthrough();

export const LegacyPlaceDetailsResponseSchema = LegacyStatusSchema.extend({
  result: LegacyPlaceSchema.optional(),
  html_attributions: z.array(z.string()).default([])
}).passthrough();

export const LegacyPredictionSchema = z
  .object({
    description: z.string(),
    place_id: z.string().optional(),
    types: z.array(z.string()).default([]),
    structured_formatting: z
      .object({ main_text: z.string(), secondary_text: z.string().optional() })
      .passthrough()
      .optional()
  })
  .passthrough();

export const LegacyPlaceAutocompleteResponseSchema = LegacyStatusSchema.extend({
  predictions: z.array(LegacyPredictionSchema).default([])
}).passthrough();

export type LegacyPlace = z.infer<typeof LegacyPlaceSchema>;
export type LegacyPlaceSearchResponse = z.infer<typeof LegacyPlaceSearchResponseSchema>;
export type LegacyPlaceDetailsResponse = z.infer<typeof LegacyPlaceDetailsResponseSchema>;
export type LegacyPlaceAutocompleteResponse = z.infer<typeof LegacyPlaceAutocompleteResponseSchema>;

const joinPipe = (values: readonly string[] | undefined): string | undefined =>
  values && values.length > 0 ? values.join('|') : undefined;

const formatOptionalLatLng = (value: z.infer<typeof LatLngSchema> | undefined): string | undefined =>
  value ? formatLatLng(value) : undefined;

export const buildLegacyTextSearchQuery = (input: LegacyTextSearchRequest) => {
  const request = parseRequest(LegacyTextSearchRequestSchema, input, TITLE);

  return {
    query: request.query,
    location: formatOptionalLatLng(request.location),
    radius: request.radius,
    type: request.type,
    language: request.language,
    region: request.region,
    minprice: request.minPrice,
    maxprice: request.maxPrice,
    opennow: request.openNow || undefined,
    pagetoken: request.pageToken
  };
};

export const buildLegacyNearbySearchQuery = (input: LegacyNearbySearchRequest) => {
  const request = parseRequest(LegacyNearbySearchRequestSchema, input, TITLE);

  return {
    location: formatLatLng(request.location),
    radius: request.radius,
    rankby: request.rankBy,
    keyword: request.keyword,
    type: request.type,
    language: request.language,
    minprice: request.minPrice,
    maxprice: request.maxPrice,
    opennow: request.openNow || undefined,
    pagetoken: request.pageToken
  };
};

export const buildLegacyPlaceDetailsQuery = (input: LegacyPlaceDetailsRequest) => {
  const request = parseRequest(LegacyPlaceDetailsRequestSchema, input, TITLE);

  return {
    place_id: request.placeId,
    fields: request.fields?.join(','),
    language: request.language,
    region: request.region,
    sessiontoken: request.sessionToken,
    reviews_sort: request.reviewsSort,
    reviews_no_translations: request.reviewsNoTranslations
  };
};

export const buildLegacyPlaceAutocompleteQuery = (input: LegacyPlaceAutocompleteRequest) => {
  const request = parseRequest(LegacyPlaceAutocompleteRequestSchema, input, TITLE);

  return {
    input: request.input,
    components: joinPipe(request.components?.map((country) => `country:${country.toLowerCase()}`)),
    types: joinPipe(request.types),
    location: formatOptionalLatLng(request.location),
    radius: request.radius,
    strictbounds: request.strictBounds,
    origin: formatOptionalLatLng(request.origin),
    offset: request.offset,
    language: request.language,
    region: request.region,
    sessiontoken: request.sessionToken
  };
};

export const fetchLegacyTextSearch = async (
  client: MapsClient,
  request: LegacyTextSearchRequest
): Promise<LegacyPlaceSearchResponse> =>
  client.request({
    title: TITLE,
    apis: ['Places'],
    service: 'maps',
    path: 'place/textsearch/json',
    query: buildLegacyTextSearchQuery(request),
    auth: 'query',
    schema: LegacyPlaceSearchResponseSchema,
    applicationError: checkLegacyStatus
  });

export const fetchLegacyNearbySearch = async (
  client: MapsClient,
  request: LegacyNearbySearchRequest
): Promise<LegacyPlaceSearchResponse> =>
  client.request({
    title: TITLE,
    apis: ['Places'],
    service: 'maps',
    path: 'place/nearbysearch/json',
    query: buildLegacyNearbySearchQuery(request),
    auth: 'query',
    schema: LegacyPlaceSearchResponseSchema,
    applicationError: checkLegacyStatus
  });

export const fetchLegacyPlaceDetails = async (
  client: MapsClient,
  request: LegacyPlaceDetailsRequest
): Promise<LegacyPlaceDetailsResponse> =>
  client.request({
    title: TITLE,
    apis: ['Places'],
    service: 'maps',
    path: 'place/details/json',
    query: buildLegacyPlaceDetailsQuery(request),
    auth: 'query',
    schema: LegacyPlaceDetailsResponseSchema,
    applicationError: checkLegacyStatus
  });

export const fetchLegacyPlaceAutocomplete = async (
  client: MapsClient,
  request: LegacyPlaceAutocompleteRequest
): Promise<LegacyPlaceAutocompleteResponse> =>
  client.request({
    title: TITLE,
    apis: ['Places'],
    service: 'maps',
    path: 'place/autocomplete/json',
    query: buildLegacyPlaceAutocompleteQuery(request),
    auth: 'query',
    schema: LegacyPlaceAutocompleteResponseSchema,
    applicationError: checkLegacyStatus
  });
