import { http, HttpResponse } from 'msw';

import {
  addressValidationFixture,
  autocompleteFixture,
  directionsFixture,
  distanceMatrixFixture,
  elevationFixture,
  harbourGeocodeFixture,
  harbourReverseGeocodeFixture,
  legacyNearbySearchFixture,
  legacyPlaceAutocompleteFixture,
  legacyPlaceDetailsFixture,
  legacyTextSearchFixture,
  nearbySearchFixture,
  placeDetailsFixture,
  requestDeniedFixture,
  rpcInvalidArgumentFixture,
  rpcPermissionDeniedFixture,
  textSearchFixture,
  timeZoneFixture,
  validationFeedbackFixture
} from '../fixtures/google';

const MAPS_API = 'https://maps.googleapis.com/maps/api';

export const GOOGLE_URLS = {
  geocode: `${MAPS_API}/geocode/json`,
  timeZone: `${MAPS_API}/timezone/json`,
  elevation: `${MAPS_API}/elevation/json`,
  distanceMatrix: `${MAPS_API}/distancematrix/json`,
  directions: `${MAPS_API}/directions/json`,
  legacyTextSearch: `${MAPS_API}/place/textsearch/json`,
  legacyNearbySearch: `${MAPS_API}/place/nearbysearch/json`,
  legacyPlaceDetails: `${MAPS_API}/place/details/json`,
  legacyPlaceAutocomplete: `${MAPS_API}/place/autocomplete/json`,
  placeDetails: 'https://places.googleapis.com/v1/places/:placeId',
  // Colons in these paths would otherwise be read as route parameters.
  textSearch: /^https:\/\/places\.googleapis\.com\/v1\/places:searchText/,
  nearbySearch: /^https:\/\/places\.googleapis\.com\/v1\/places:searchNearby/,
  autocomplete: /^https:\/\/places\.googleapis\.com\/v1\/places:autocomplete/,
  addressValidation: /^https:\/\/addressvalidation\.googleapis\.com\/v1:validateAddress/,
  validationFeedback: /^https:\/\/addressvalidation\.googleapis\.com\/v1:provideValidationFeedback/
} as const;

export type GoogleUrl = (typeof GOOGLE_URLS)[keyof typeof GOOGLE_URLS];

type ResponseFactory = () => Response;

const hasQueryKey = (request: Request) => Boolean(new URL(request.url).searchParams.get('key'));

const hasHeaderKey = (request: Request) => Boolean(request.headers.get('X-Goog-Api-Key'));

const legacyHandler = (url: string, body: Record<string, unknown>) =>
  http.get(url, ({ request }) => {
    if (!hasQueryKey(request)) {
      return HttpResponse.json(requestDeniedFixture);
    }
    return HttpResponse.json(body);
  });

export const googleGeocodeSuccessHandler = http.get(GOOGLE_URLS.geocode, ({ request }) => {
  if (!hasQueryKey(request)) {
    return HttpResponse.json(requestDeniedFixture);
  }

  const isReverse = new URL(request.url).searchParams.has('latlng');
  return HttpResponse.json(isReverse ? harbourReverseGeocodeFixture : harbourGeocodeFixture);
});

export const googleTimeZoneSuccessHandler = legacyHandler(GOOGLE_URLS.timeZone, timeZoneFixture);

export const googleElevationSuccessHandler = legacyHandler(GOOGLE_URLS.elevation, elevationFixture);

export const googleDistanceMatrixSuccessHandler = legacyHandler(GOOGLE_URLS.distanceMatrix, distanceMatrixFixture);

export const googleDirectionsSuccessHandler = legacyHandler(GOOGLE_URLS.directions, directionsFixture);

export const googleLegacyTextSearchSuccessHandler = legacyHandler(GOOGLE_URLS.legacyTextSearch, legacyTextSearchFixture);

export const googleLegacyNearbySearchSuccessHandler = legacyHandler(
  GOOGLE_URLS.legacyNearbySearch,
  legacyNearbySearchFixture
);

export const googleLegacyPlaceDetailsSuccessHandler = legacyHandler(
  GOOGLE_URLS.legacyPlaceDetails,
  legacyPlaceDetailsFixture
);

export const googleLegacyPlaceAutocompleteSuccessHandler = legacyHandler(
  GOOGLE_URLS.legacyPlaceAutocomplete,
  legacyPlaceAutocompleteFixture
);

const placeSearchHandler = (url: RegExp, body: Record<string, unknown>) =>
  http.post(url, ({ request }) => {
    if (!hasHeaderKey(request)) {
      return HttpResponse.json(rpcPermissionDeniedFixture, { status: 403 });
    }
    if (!request.headers.get('X-Goog-FieldMask')) {
      return HttpResponse.json(rpcInvalidArgumentFixture, { status: 400 });
    }
    return HttpResponse.json(body);
  });

export const googleTextSearchSuccessHandler = placeSearchHandler(GOOGLE_URLS.textSearch, textSearchFixture);

export const googleNearbySearchSuccessHandler = placeSearchHandler(GOOGLE_URLS.nearbySearch, nearbySearchFixture);

export const googleAutocompleteSuccessHandler = http.post(GOOGLE_URLS.autocomplete, ({ request }) => {
  if (!hasHeaderKey(request)) {
    return HttpResponse.json(rpcPermissionDeniedFixture, { status: 403 });
  }
  return HttpResponse.json(autocompleteFixture);
});

export const googlePlaceDetailsSuccessHandler = http.get(GOOGLE_URLS.placeDetails, ({ request, params }) => {
  if (!hasHeaderKey(request)) {
    return HttpResponse.json(rpcPermissionDeniedFixture, { status: 403 });
  }
  return HttpResponse.json({ ...placeDetailsFixture, id: String(params.placeId) });
});

export const googleAddressValidationSuccessHandler = http.post(GOOGLE_URLS.addressValidation, ({ request }) => {
  if (!hasHeaderKey(request)) {
    return HttpResponse.json(rpcPermissionDeniedFixture, { status: 403 });
  }
  return HttpResponse.json(addressValidationFixture);
});

export const googleValidationFeedbackSuccessHandler = http.post(GOOGLE_URLS.validationFeedback, ({ request }) => {
  if (!hasHeaderKey(request)) {
    return HttpResponse.json(rpcPermissionDeniedFixture, { status: 403 });
  }
  return HttpResponse.json(validationFeedbackFixture);
});

/**
 * Answers each call with the next factory in order; the last one repeats. `onAttempt` sees the 1-based call number.
 */
export const createGoogleSequenceHandler = (
  method: 'get' | 'post',
  url: GoogleUrl,
  responses: readonly ResponseFactory[],
  onAttempt?: (attempt: number, request: Request) => void
) => {
  let callCount = 0;
  return http[method](url, ({ request }) => {
    callCount += 1;
    onAttempt?.(callCount, request);
    const factory = responses[Math.min(callCount, responses.length) - 1];
    return factory ? factory() : HttpResponse.error();
  });
};

export const googleJson = (body: Record<string, unknown>, status = 200): ResponseFactory => () => HttpResponse.json(body, { status });

export const googleText = (body: string, status = 200): ResponseFactory => () => new HttpResponse(body, { status });

export const googleNetworkError: ResponseFactory = () => HttpResponse.error();

export const googleHandlers = [
  googleGeocodeSuccessHandler,
  googleTimeZoneSuccessHandler,
  googleElevationSuccessHandler,
  googleDistanceMatrixSuccessHandler,
  googleDirectionsSuccessHandler,
  googleLegacyTextSearchSuccessHandler,
  googleLegacyNearbySearchSuccessHandler,
  googleLegacyPlaceDetailsSuccessHandler,
  googleLegacyPlaceAutocompleteSuccessHandler,
  googleTextSearchSuccessHandler,
  googleNearbySearchSuccessHandler,
  googleAutocompleteSuccessHandler,
  googlePlaceDetailsSuccessHandler,
  googleAddressValidationSuccessHandler,
  googleValidationFeedbackSuccessHandler
];
