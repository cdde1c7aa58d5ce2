export const GOOGLE_TEST_API_KEY = 'test-key';

export const harbourGeocodeFixture = {
  results: [
    {
      formatted_address: '12 Harbour Road, Port Elin, PE1 2AB',
      geometry: {
        location: { lat: 51.5072, lng: -0.1276 },
        location_type: 'ROOFTOP',
        viewport: {
          northeast: { lat: 51.5085, lng: -0.1262 },
          southwest: { lat: 51.5058, lng: -0.129 }
        }
      },
      place_id: 'test-place-harbour-road',
      types: ['street_address']
    }
  ],
  status: 'OK'
} as const;

export const harbourReverseGeocodeFixture = {
  results: [
    {
      formatted_address: '12 Harbour Road, Port Elin, PE1 2AB',
      geometry: {
        location: { lat: 51.5072, lng: -0.1276 },
        location_type: 'ROOFTOP'
      },
      place_id: 'test-place-harbour-road',
      types: ['street_address']
    },
    {
      formatted_address: 'Port Elin, PE1',
      geometry: {
        location: { lat: 51.51, lng: -0.13 },
        location_type: 'APPROXIMATE'
      },
      place_id: 'test-place-port-elin',
      types: ['locality', 'political']
    }
  ],
  status: 'OK'
} as const;

export const timeZoneFixture = {
  dstOffset: 3600,
  rawOffset: 0,
  status: 'OK',
  timeZoneId: 'Europe/London',
  timeZoneName: 'British Summer Time'
} as const;

export const elevationFixture = {
  results: [
    {
      elevation: 14.25,
      location: { lat: 51.5072, lng: -0.1276 },
      resolution: 4.77
    }
  ],
  status: 'OK'
} as const;

export const distanceMatrixFixture = {
  destination_addresses: ['Lighthouse Lane, Port Elin', 'Mill Street, Upper Brook'],
  origin_addresses: ['12 Harbour Road, Port Elin'],
  rows: [
    {
      elements: [
        {
          status: 'OK',
          distance: { text: '2.4 km', value: 2400 },
          duration: { text: '7 mins', value: 420 }
        },
        {
          status: 'ZERO_RESULTS'
        }
      ]
    }
  ],
  status: 'OK'
} as const;

export const directionsFixture = {
  geocoded_waypoints: [{ geocoder_status: 'OK' }, { geocoder_status: 'OK' }],
  routes: [
    {
      summary: 'Harbour Road',
      legs: [
        {
          start_address: '12 Harbour Road, Port Elin',
          end_address: 'Lighthouse Lane, Port Elin',
          distance: { text: '2.4 km', value: 2400 },
          duration: { text: '7 mins', value: 420 }
        }
      ],
      waypoint_order: []
    }
  ],
  status: 'OK'
} as const;

export const textSearchFixture = {
  places: [
    {
      id: 'test-place-quay-cafe',
      displayName: { text: 'Quay Cafe', languageCode: 'en' },
      formattedAddress: '3 Quay Street, Port Elin',
      location: { latitude: 51.5069, longitude: -0.1281 },
      rating: 4.5,
      types: ['cafe', 'food']
    }
  ]
} as const;

export const placeDetailsFixture = {
  id: 'test-place-quay-cafe',
  displayName: { text: 'Quay Cafe', languageCode: 'en' },
  formattedAddress: '3 Quay Street, Port Elin',
  location: { latitude: 51.5069, longitude: -0.1281 }
} as const;

export const addressValidationFixture = {
  result: {
    verdict: {
      inputGranularity: 'PREMISE',
      validationGranularity: 'PREMISE',
      geocodeGranularity: 'PREMISE',
      addressComplete: true
    },
    address: {
      formattedAddress: '12 Harbour Road, Port Elin PE1 2AB, UK'
    }
  },
  responseId: 'test-response-1'
} as const;

export const nearbySearchFixture = {
  places: [
    {
      id: 'test-place-harbour-museum',
      displayName: { text: 'Harbour Museum', languageCode: 'en' },
      formattedAddress: '1 Harbour Road, Port Elin',
      location: { latitude: 51.5071, longitude: -0.1279 },
      types: ['museum', 'tourist_attraction']
    }
  ]
} as const;

export const autocompleteFixture = {
  suggestions: [
    {
      placePrediction: {
        place: 'places/test-place-quay-cafe',
        placeId: 'test-place-quay-cafe',
        text: { text: 'Quay Cafe, 3 Quay Street, Port Elin' },
        types: ['cafe', 'food']
      }
    },
    {
      queryPrediction: {
        text: { text: 'quay cafes in Port Elin' }
      }
    }
  ]
} as const;

export const validationFeedbackFixture = {} as const;

export const legacyTextSearchFixture = {
  html_attributions: [],
  results: [
    {
      place_id: 'test-place-quay-cafe',
      name: 'Quay Cafe',
      formatted_address: '3 Quay Street, Port Elin',
      geometry: { location: { lat: 51.5069, lng: -0.1281 } },
      rating: 4.5,
      types: ['cafe', 'food']
    }
  ],
  status: 'OK'
} as const;

export const legacyNearbySearchFixture = {
  html_attributions: [],
  next_page_token: 'test-page-2',
  results: [
    {
      place_id: 'test-place-harbour-museum',
      name: 'Harbour Museum',
      vicinity: '1 Harbour Road, Port Elin',
      business_status: 'OPERATIONAL',
      geometry: { location: { lat: 51.5071, lng: -0.1279 } },
      types: ['museum', 'tourist_attraction']
    }
  ],
  status: 'OK'
} as const;

export const legacyPlaceDetailsFixture = {
  html_attributions: [],
  result: {
    place_id: 'test-place-quay-cafe',
    name: 'Quay Cafe',
    formatted_address: '3 Quay Street, Port Elin',
    geometry: { location: { lat: 51.5069, lng: -0.1281 } },
    types: ['cafe', 'food']
  },
  status: 'OK'
} as const;

export const legacyPlaceAutocompleteFixture = {
  predictions: [
    {
      description: 'Quay Cafe, Quay Street, Port Elin',
      place_id: 'test-place-quay-cafe',
      types: ['cafe', 'food', 'establishment'],
      structured_formatting: { main_text: 'Quay Cafe', secondary_text: 'Quay Street, Port Elin' }
    }
  ],
  status: 'OK'
} as const;

export const zeroResultsFixture = {
  results: [],
  status: 'ZERO_RESULTS'
} as const;

export const overQueryLimitFixture = {
  error_message: 'You have exceeded your rate-limit for this API.',
  results: [],
  status: 'OVER_QUERY_LIMIT'
} as const;

export const unknownErrorFixture = {
  error_message: 'Server error, please try again.',
  results: [],
  status: 'UNKNOWN_ERROR'
} as const;

export const requestDeniedFixture = {
  error_message: 'The provided API key is invalid.',
  results: [],
  status: 'REQUEST_DENIED'
} as const;

/**
 * `google.rpc.Status` body returned by the newer APIs on failure.
 */
export const rpcPermissionDeniedFixture = {
  error: {
    code: 403,
    message: 'Method doesn\'t allow unregistered callers.',
    status: 'PERMISSION_DENIED'
  }
} as const;

export const rpcInvalidArgumentFixture = {
  error: {
    code: 400,
    message: 'Invalid field mask.',
    status: 'INVALID_ARGUMENT'
  }
} as const;
