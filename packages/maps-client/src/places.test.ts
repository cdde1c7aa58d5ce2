import { GOOGLE_URLS, createGoogleSequenceHandler, googleJson } from '@wayfarer/msw/handlers/google';
import { legacyTextSearchFixture, zeroResultsFixture } from '@wayfarer/msw/fixtures/google';
import { mockServer } from '@wayfarer/msw/server';
import { describe, expect, it } from 'vitest';

import { createMapsClient } from './client';
import {
  buildLegacyNearbySearchQuery,
  buildLegacyPlaceAutocompleteQuery,
  buildLegacyPlaceDetailsQuery,
  buildLegacyTextSearchQuery,
  fetchLegacyNearbySearch,
  fetchLegacyPlaceAutocomplete,
  fetchLegacyPlaceDetails,
  fetchLegacyTextSearch
} from './places';

const createClient = () => createMapsClient({ apiKey: 'test-key', sleep: async () => {} });

const harbour = { lat: 51.5, lng: -0.12 };

describe('buildLegacyTextSearchQuery', () => {
  it('encodes the query with its filters', () => {
    expect(
      buildLegacyTextSearchQuery({ query: 'cafe', location: harbour, radius: 500, minPrice: 1, openNow: true })
    ).toEqual({ query: 'cafe', location: '51.5,-0.12', radius: 500, minprice: 1, opennow: true });
  });

  it('leaves opennow out unless it is set', () => {
    expect(buildLegacyTextSearchQuery({ query: 'cafe', openNow: false }).opennow).toBeUndefined();
  });

  it('rejects an empty query', () => {
    expect(() => buildLegacyTextSearchQuery({ query: '' })).toThrow('Invalid Places API request');
  });
});

describe('buildLegacyNearbySearchQuery', () => {
  it('needs a radius unless ranking by distance', () => {
    expect(() => buildLegacyNearbySearchQuery({ location: harbour })).toThrow('Invalid Places API request');
    expect(buildLegacyNearbySearchQuery({ location: harbour, radius: 800, keyword: 'ferry' })).toEqual({
      location: '51.5,-0.12',
      radius: 800,
      keyword: 'ferry'
    });
  });

  it('ranks by distance without a radius when given a keyword or type', () => {
    expect(buildLegacyNearbySearchQuery({ location: harbour, rankBy: 'distance', type: 'museum' })).toEqual({
      location: '51.5,-0.12',
      rankby: 'distance',
      type: 'museum'
    });
    expect(() => buildLegacyNearbySearchQuery({ location: harbour, rankBy: 'distance', radius: 800, type: 'museum' })).toThrow(
      'Invalid Places API request'
    );
    expect(() => buildLegacyNearbySearchQuery({ location: harbour, rankBy: 'distance' })).toThrow(
      'Invalid Places API request'
    );
  });
});

describe('buildLegacyPlaceDetailsQuery', () => {
  it('joins the requested fields with commas', () => {
    expect(
      buildLegacyPlaceDetailsQuery({
        placeId: 'test-place-quay-cafe',
        fields: ['name', 'formatted_address'],
        reviewsSort: 'newest',
        sessionToken: 'test-session'
      })
    ).toEqual({
      place_id: 'test-place-quay-cafe',
      fields: 'name,formatted_address',
      reviews_sort: 'newest',
      sessiontoken: 'test-session'
    });
  });
});

describe('buildLegacyPlaceAutocompleteQuery', () => {
  it('restricts countries and types with pipes', () => {
    expect(
      buildLegacyPlaceAutocompleteQuery({
        input: 'Quay',
        components: ['GB', 'IE'],
        types: ['establishment'],
        location: harbour,
        radius: 2_000,
        strictBounds: true
      })
    ).toEqual({
      input: 'Quay',
      components: 'country:gb|country:ie',
      types: 'establishment',
      location: '51.5,-0.12',
      radius: 2_000,
      strictbounds: true
    });
  });

  it('rejects country codes that are not two letters', () => {
    expect(() => buildLegacyPlaceAutocompleteQuery({ input: 'Quay', components: ['GBR'] })).toThrow(
      'Invalid Places API request'
    );
  });
});

describe('legacy Places calls', () => {
  it('sends the text search with the key as a query parameter', async () => {
    const urls: URL[] = [];
    mockServer.use(
      createGoogleSequenceHandler('get', GOOGLE_URLS.legacyTextSearch, [googleJson(legacyTextSearchFixture)], (_attempt, request) => {
        urls.push(new URL(request.url));
      })
    );

    const response = await fetchLegacyTextSearch(createClient(), { query: 'cafe near harbour', region: 'gb' });

    expect(response.results[0]?.name).toBe('Quay Cafe');
    expect(urls[0]?.searchParams.get('query')).toBe('cafe near harbour');
    expect(urls[0]?.searchParams.get('region')).toBe('gb');
    expect(urls[0]?.searchParams.get('key')).toBe('test-key');
  });

  it('returns the next page token of a nearby search', async () => {
    const response = await fetchLegacyNearbySearch(createClient(), { location: harbour, radius: 500 });

    expect(response.results.map((place) => place.vicinity)).toEqual(['1 Harbour Road, Port Elin']);
    expect(response.next_page_token).toBe('test-page-2');
  });

  it('fetches place details and autocomplete predictions', async () => {
    const client = createClient();

    const details = await fetchLegacyPlaceDetails(client, { placeId: 'test-place-quay-cafe' });
    const autocomplete = await fetchLegacyPlaceAutocomplete(client, { input: 'Quay' });

    expect(details.result?.formatted_address).toBe('3 Quay Street, Port Elin');
    expect(autocomplete.predictions[0]?.structured_formatting?.main_text).toBe('Quay Cafe');
  });

  it('fails on a non-OK status', async () => {
    mockServer.use(createGoogleSequenceHandler('get', GOOGLE_URLS.legacyTextSearch, [googleJson(zeroResultsFixture)]));

    await expect(fetchLegacyTextSearch(createClient(), { query: 'lighthouse museum' })).rejects.toMatchObject({
      code: 'APPLICATION_PERMANENT',
      apiStatus: 'ZERO_RESULTS',
      message: 'Places API returned ZERO_RESULTS'
    });
  });

  it('counts calls against the Places budget', async () => {
    const client = createMapsClient({
      apiKey: 'test-key',
      sleep: async () => {},
      rateLimits: [{ api: 'Places', requests: 10, perDurationMs: 10_000 }]
    });

    await fetchLegacyPlaceDetails(client, { placeId: 'test-place-quay-cafe' });

    expect(client.rateLimiter.snapshot('Places')?.totalRequestCount).toBe(1);
    expect(client.rateLimiter.snapshot('PlacesNew')).toBeUndefined();
  });
});
