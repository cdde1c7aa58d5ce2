/**
 * Categories a rate limit can be registered against. `All` is checked on every request.
 */
export const API_CATEGORIES = [
  'All',
  'Directions',
  'DistanceMatrix',
  'Elevation',
  'Geocoding',
  'TimeZone',
  'Places',
  'PlacesNew',
  'AddressValidation'
] as const;

export type Api = (typeof API_CATEGORIES)[number];

const API_LABELS: Record<Api, string> = {
  All: 'All',
  Directions: 'Directions',
  DistanceMatrix: 'Distance Matrix',
  Elevation: 'Elevation',
  Geocoding: 'Geocoding',
  TimeZone: 'Time Zone',
  Places: 'Places',
  PlacesNew: 'Places (New)',
  AddressValidation: 'Address Validation'
};

export const apiLabel = (api: Api): string => API_LABELS[api];
