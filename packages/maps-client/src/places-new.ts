import { type LatLng, LatLngSchema } from '@wayfarer/domain';
import { z } from 'zod';

import { type MapsClient, parseRequest } from './client';

const TITLE = 'Places API (New)';
const ALL_FIELDS = '*';

/**
 * Response fields to return, e.g. `['id', 'displayName', 'location']`. Omitted or `['*']` asks for every field.
 */
export const FieldMaskSchema = z.array(z.string().min(1)).min(1).optional();

export type FieldMask = z.infer<typeof FieldMaskSchema>;

/**
 * The search endpoints nest results under `places`, so their field paths carry that prefix.
 */
export const formatFieldMask = (fields: FieldMask, prefix?: string): string => {
  if (!fields || fields.includes(ALL_FIELDS)) {
    return ALL_FIELDS;
  }

  return fields
    .map((field) => (prefix && !field.startsWith(`${prefix}.`) ? `${prefix}.${field}` : field))
    .join(',');
};

const CircleSchema = z.object({
  center: LatLngSchema,
  radiusMeters: z.number().positive().max(50_000)
});

type Circle = z.infer<typeof CircleSchema>;

const toLatLngLiteral = ({ lat, lng }: LatLng) => ({ latitude: lat, longitude: lng });

const toCircle = (circle: Circle) => ({
  circle: { center: toLatLngLiteral(circle.center), radius: circle.radiusMeters }
});

export const TextSearchRequestSchema = z.object({
  textQuery: z.string().min(1, 'textQuery must not be empty'),
  fieldMask: FieldMaskSchema,
  languageCode: z.string().min(2).optional(),
  regionCode: z.string().length(2).optional(),
  includedType: z.string().min(1).optional(),
  openNow: z.boolean().optional(),
  minRating: z.number().min(0).max(5).optional(),
  maxResultCount: z.number().int().min(1).max(20).optional(),
  locationBias: CircleSchema.optional()
});

export const NearbySearchRequestSchema = z.object({
  location: LatLngSchema,
  radiusMeters: CircleSchema.shape.radiusMeters,
  fieldMask: FieldMaskSchema,
  includedTypes: z.array(z.string().min(1)).optional(),
  excludedTypes: z.array(z.string().min(1)).optional(),
  includedPrimaryTypes: z.array(z.string().min(1)).optional(),
  maxResultCount: z.number().int().min(1).max(20).optional(),
  rankPreference: z.enum(['POPULARITY', 'DISTANCE']).optional(),
  languageCode: z.string().min(2).optional(),
  regionCode: z.string().length(2).optional()
});

export const AutocompleteRequestSchema = z.object({
  input: z.string().min(1, 'input must not be empty'),
  locationBias: CircleSchema.optional(),
  includedPrimaryTypes: z.array(z.string().min(1)).max(5).optional(),
  includedRegionCodes: z.array(z.string().length(2)).max(15).optional(),
  origin: LatLngSchema.optional(),
  inputOffset: z.number().int().nonnegative().optional(),
  languageCode: z.string().min(2).optional(),
  regionCode: z.string().length(2).optional(),
  sessionToken: z.string().min(1).optional()
});

export const PlaceDetailsRequestSchema = z.object({
  placeId: z.string().min(1, 'placeId must not be empty'),
  fieldMask: FieldMaskSchema,
  languageCode: z.string().min(2).optional(),
  regionCode: z.string().length(2).optional(),
  sessionToken: z.string().min(1).optional()
});

export type TextSearchRequest = z.input<typeof TextSearchRequestSchema>;
export type NearbySearchRequest = z.input<typeof NearbySearchRequestSchema>;
export type AutocompleteRequest = z.input<typeof AutocompleteRequestSchema>;
export type PlaceDetailsRequest = z.input<typeof PlaceDetailsRequestSchema>;

export const PlaceDetailsSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    displayName: z.object({ text: z.string(), languageCode: z.string().optional() }).passthrough().optional(),
    formattedAddress: z.string().optional(),
    location: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
    types: z.array(z.string()).optional(),
    rating: z.number().optional()
  })
  .passthrough();

export const TextSearchResponseSchema = z
  .object({
    places: z.array(PlaceDetailsSchema).default([]),
    nextPageToken: z.string().optional()
  })
  .passthrough();

export const NearbySearchResponseSchema = z
  .object({
    places: z.array(PlaceDetailsSchema).default([])
  })
  .passthrough();

const FormattableTextSchema = z.object({ text: z.string() }).passthrough();

/**
 * Each suggestion carries either a place or a query prediction.
 */
export const SuggestionSchema = z
  .object({
    placePrediction: z
      .object({
        placeId: z.string(),
        place: z.string().optional(),
        text: FormattableTextSchema,
        types: z.array(z.string()).default([])
      })
      .passthrough()
      .optional(),
    queryPrediction: z.object({ text: FormattableTextSchema }).passthrough().optional()
  })
  .passthrough();

export const AutocompleteResponseSchema = z
  .object({
    suggestions: z.array(SuggestionSchema).default([])
  })
  .passthrough();

export type PlaceDetails = z.infer<typeof PlaceDetailsSchema>;
export type TextSearchResponse = z.infer<typeof TextSearchResponseSchema>;
export type NearbySearchResponse = z.infer<typeof NearbySearchResponseSchema>;
export type Suggestion = z.infer<typeof SuggestionSchema>;
export type AutocompleteResponse = z.infer<typeof AutocompleteResponseSchema>;

export const buildTextSearchBody = (input: TextSearchRequest) => {
  const { fieldMask, locationBias, ...request } = parseRequest(TextSearchRequestSchema, input, TITLE);

  return {
    fieldMask: formatFieldMask(fieldMask, 'places'),
    body: {
      ...request,
      locationBias: locationBias && toCircle(locationBias)
    }
  };
};

/**
 * Nearby Search takes a hard circle restriction rather than a bias.
 */
export const buildNearbySearchBody = (input: NearbySearchRequest) => {
  const { fieldMask, location, radiusMeters, ...request } = parseRequest(NearbySearchRequestSchema, input, TITLE);

  return {
    fieldMask: formatFieldMask(fieldMask, 'places'),
    body: {
      ...request,
      locationRestriction: toCircle({ center: location, radiusMeters })
    }
  };
};

export const buildAutocompleteBody = (input: AutocompleteRequest) => {
  const { locationBias, origin, ...request } = parseRequest(AutocompleteRequestSchema, input, TITLE);

  return {
    ...request,
    locationBias: locationBias && toCircle(locationBias),
    origin: origin && toLatLngLiteral(origin)
  };
};

export const fetchTextSearch = async (client: MapsClient, request: TextSearchRequest): Promise<TextSearchResponse> => {
  const { fieldMask, body } = buildTextSearchBody(request);

  return client.request({
    title: TITLE,
    apis: ['PlacesNew'],
    method: 'POST',
    service: 'places',
    path: 'places:searchText',
    body,
    headers: { 'X-Goog-FieldMask': fieldMask },
    auth: 'header',
    schema: TextSearchResponseSchema
  });
};

export const fetchNearbySearch = async (
  client: MapsClient,
  request: NearbySearchRequest
): Promise<NearbySearchResponse> => {
  const { fieldMask, body } = buildNearbySearchBody(request);

  return client.request({
    title: TITLE,
    apis: ['PlacesNew'],
    method: 'POST',
    service: 'places',
    path: 'places:searchNearby',
    body,
    headers: { 'X-Goog-FieldMask': fieldMask },
    auth: 'header',
    schema: NearbySearchResponseSchema
  });
};

export const fetchAutocomplete = async (client: MapsClient, request: AutocompleteRequest): Promise<AutocompleteResponse> =>
  client.request({
    title: TITLE,
    apis: ['PlacesNew'],
    method: 'POST',
    service: 'places',
    path: 'places:autocomplete',
    body: buildAutocompleteBody(request),
    auth: 'header',
    schema: AutocompleteResponseSchema
  });

export const fetchPlaceDetails = async (client: MapsClient, input: PlaceDetailsRequest): Promise<PlaceDetails> => {
  const request = parseRequest(PlaceDetailsRequestSchema, input, TITLE);

  return client.request({
    title: TITLE,
    apis: ['PlacesNew'],
    service: 'places',
    path: `places/${encodeURIComponent(request.placeId)}`,
    query: {
      languageCode: request.languageCode,
      regionCode: request.regionCode,
      sessionToken: request.sessionToken
    },
    headers: { 'X-Goog-FieldMask': formatFieldMask(request.fieldMask) },
    auth: 'header',
    schema: PlaceDetailsSchema
  });
};
