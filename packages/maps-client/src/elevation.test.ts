import { GOOGLE_URLS, createGoogleSequenceHandler, googleJson } from '@wayfarer/msw/handlers/google';
import { elevationFixture, unknownErrorFixture } from '@wayfarer/msw/fixtures/google';
import { mockServer } from '@wayfarer/msw/server';
import { describe, expect, it } from 'vitest';

import { createMapsClient } from './client';
import { buildElevationQuery, fetchElevation } from './elevation';

const createClient = () => createMapsClient({ apiKey: 'test-key', sleep: async () => {} });

const HARBOUR = { lat: 51.5072, lng: -0.1276 };
const SUMMIT = { lat: 40, lng: -105.25 };

describe('buildElevationQuery', () => {
  it('pipe-joins positional locations', () => {
    expect(buildElevationQuery({ locations: [HARBOUR, SUMMIT] })).toEqual({
      locations: '51.5072,-0.1276|40,-105.25'
    });
  });

  it('sends a sampled path with its sample count', () => {
    expect(buildElevationQuery({ path: [HARBOUR, SUMMIT], samples: 3 })).toEqual({
      path: '51.5072,-0.1276|40,-105.25',
      samples: 3
    });
  });

  it('rejects a path with a single point', () => {
    expect(() => buildElevationQuery({ path: [HARBOUR], samples: 2 })).toThrow('Invalid Elevation API request');
  });
});

describe('fetchElevation', () => {
  it('returns the elevation of each location', async () => {
    const response = await fetchElevation(createClient(), { locations: [HARBOUR] });

    expect(response.results).toEqual([{ elevation: 14.25, location: HARBOUR, resolution: 4.77 }]);
  });

  it('retries UNKNOWN_ERROR responses', async () => {
    const attempts: number[] = [];
    mockServer.use(
      createGoogleSequenceHandler(
        'get',
        GOOGLE_URLS.elevation,
        [googleJson(unknownErrorFixture), googleJson(unknownErrorFixture), googleJson(elevationFixture)],
        (attempt) => attempts.push(attempt)
      )
    );

    const response = await fetchElevation(createClient(), { locations: [HARBOUR] });

    expect(response.status).toBe('OK');
    expect(attempts).toEqual([1, 2, 3]);
  });
});
