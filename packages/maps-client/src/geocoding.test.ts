import { GOOGLE_URLS, createGoogleSequenceHandler, googleJson } from '@wayfarer/msw/handlers/google';
import { harbourGeocodeFixture } from '@wayfarer/msw/fixtures/google';
import { mockServer } from '@wayfarer/msw/server';
import { describe, expect, it } from 'vitest';

import { createMapsClient } from './client';
import { buildGeocodingQuery, buildReverseGeocodingQuery, fetchGeocode, fetchReverseGeocode } from './geocoding';

const createClient = () => createMapsClient({ apiKey: 'test-key', sleep: async () => {} });

const captureQueries = () => {
  const queries: URLSearchParams[] = [];
  mockServer.use(
    createGoogleSequenceHandler('get', GOOGLE_URLS.geocode, [googleJson(harbourGeocodeFixture)], (_attempt, request) => {
      queries.push(new URL(request.url).searchParams);
    })
  );
  return queries;
};

describe('buildGeocodingQuery', () => {
  it('maps every forward option onto its query parameter', () => {
    const query = buildGeocodingQuery({
      address: '  12   Harbour Road ',
      components: { country: 'GB', postal_code: 'PE1 2AB' },
      bounds: { southwest: { lat: 51.5, lng: -0.2 }, northeast: { lat: 51.6, lng: -0.1 } },
      region: 'gb',
      language: 'en'
    });

    expect(query).toEqual({
      address: '12 Harbour Road',
      components: 'country:GB|postal_code:PE1 2AB',
      place_id: undefined,
      bounds: '51.5,-0.2|51.6,-0.1',
      region: 'gb',
      language: 'en'
    });
  });

  it('accepts a place ID on its own', () => {
    expect(buildGeocodingQuery({ placeId: 'test-place-harbour-road' })).toMatchObject({
      place_id: 'test-place-harbour-road',
      address: undefined
    });
  });

  it('requires an address, components or a place ID', () => {
    expect(() => buildGeocodingQuery({ language: 'en' })).toThrow('Invalid Geocoding API request');
    expect(() => buildGeocodingQuery({ components: {} })).toThrow('Invalid Geocoding API request');
  });
});

describe('buildReverseGeocodingQuery', () => {
  it('formats the coordinate and pipe-joins the filters', () => {
    const query = buildReverseGeocodingQuery({
      latlng: { lat: 51.5072, lng: -0.1276 },
      resultTypes: ['street_address', 'locality'],
      locationTypes: ['ROOFTOP']
    });

    expect(query).toEqual({
      latlng: '51.5072,-0.1276',
      result_type: 'street_address|locality',
      location_type: 'ROOFTOP',
      language: undefined
    });
  });

  it('rejects coordinates out of range', () => {
    expect(() => buildReverseGeocodingQuery({ latlng: { lat: 95, lng: 0 } })).toThrow('Invalid Geocoding API request');
  });
});

describe('fetchGeocode', () => {
  it('sends the address and key and returns the results', async () => {
    const queries = captureQueries();

    const response = await fetchGeocode(createClient(), { address: '12 Harbour Road', region: 'gb' });

    expect(response.results[0]?.place_id).toBe('test-place-harbour-road');
    expect(response.results[0]?.geometry?.location).toEqual({ lat: 51.5072, lng: -0.1276 });
    expect(queries).toHaveLength(1);
    expect(queries[0]?.get('address')).toBe('12 Harbour Road');
    expect(queries[0]?.get('region')).toBe('gb');
    expect(queries[0]?.get('key')).toBe('test-key');
    expect(queries[0]?.has('components')).toBe(false);
  });

  it('rejects ZERO_RESULTS without retrying', async () => {
    mockServer.use(
      createGoogleSequenceHandler('get', GOOGLE_URLS.geocode, [googleJson({ status: 'ZERO_RESULTS', results: [] })])
    );

    await expect(fetchGeocode(createClient(), { address: 'Nowhere Lane' })).rejects.toMatchObject({
      code: 'APPLICATION_PERMANENT',
      apiStatus: 'ZERO_RESULTS',
      message: 'Geocoding API returned ZERO_RESULTS'
    });
  });

  it('validates before touching the rate limiter', async () => {
    const client = createClient().withRate('Geocoding', 1, 1_000);

    await expect(fetchGeocode(client, {})).rejects.toMatchObject({ code: 'INVALID_REQUEST' });
    expect(client.rateLimiter.snapshot('Geocoding')?.totalRequestCount).toBe(0);
  });
});

describe('fetchReverseGeocode', () => {
  it('returns every match for the coordinate', async () => {
    const response = await fetchReverseGeocode(createClient(), { latlng: { lat: 51.5072, lng: -0.1276 } });

    expect(response.status).toBe('OK');
    expect(response.results.map((result) => result.place_id)).toEqual([
      'test-place-harbour-road',
      'test-place-port-elin'
    ]);
  });
});
