import { GOOGLE_URLS, createGoogleSequenceHandler, googleJson } from '@wayfarer/msw/handlers/google';
import { mockServer } from '@wayfarer/msw/server';
import { describe, expect, it } from 'vitest';

import { createMapsClient } from './client';
import { buildDirectionsQuery, fetchDirections } from './directions';

const createClient = () => createMapsClient({ apiKey: 'test-key', sleep: async () => {} });

describe('buildDirectionsQuery', () => {
  it('prefixes optimised waypoints', () => {
    const query = buildDirectionsQuery({
      origin: '12 Harbour Road',
      destination: { placeId: 'test-place-quay-cafe' },
      waypoints: ['Mill Street', { lat: 51.51, lng: -0.13 }],
      optimizeWaypoints: true,
      mode: 'bicycling',
      alternatives: true
    });

    expect(query).toMatchObject({
      origin: '12 Harbour Road',
      destination: 'place_id:test-place-quay-cafe',
      waypoints: 'optimize:true|Mill Street|51.51,-0.13',
      mode: 'bicycling',
      alternatives: true
    });
  });

  it('omits waypoints when there are none', () => {
    expect(buildDirectionsQuery({ origin: 'A', destination: 'B', optimizeWaypoints: true }).waypoints).toBeUndefined();
  });

  it('sends an arrival time in unix seconds', () => {
    expect(
      buildDirectionsQuery({
        origin: 'A',
        destination: 'B',
        mode: 'transit',
        arrivalTime: new Date('2024-06-01T12:00:00Z')
      })
    ).toMatchObject({ arrival_time: 1_717_243_200, departure_time: undefined });
  });

  it('refuses both a departure and an arrival time', () => {
    expect(() =>
      buildDirectionsQuery({
        origin: 'A',
        destination: 'B',
        departureTime: 'now',
        arrivalTime: new Date('2024-06-01T12:00:00Z')
      })
    ).toThrow('Invalid Directions API request');
  });
});

describe('fetchDirections', () => {
  it('returns routes with their legs', async () => {
    const response = await fetchDirections(createClient(), {
      origin: '12 Harbour Road',
      destination: 'Lighthouse Lane'
    });

    expect(response.routes[0]?.summary).toBe('Harbour Road');
    expect(response.routes[0]?.legs[0]?.distance?.value).toBe(2400);
    expect(response.routes[0]?.waypoint_order).toEqual([]);
  });

  it('rejects NOT_FOUND as permanent', async () => {
    const attempts: number[] = [];
    mockServer.use(
      createGoogleSequenceHandler(
        'get',
        GOOGLE_URLS.directions,
        [googleJson({ status: 'NOT_FOUND', routes: [], geocoded_waypoints: [{ geocoder_status: 'ZERO_RESULTS' }] })],
        (attempt) => attempts.push(attempt)
      )
    );

    await expect(
      fetchDirections(createClient(), { origin: 'Nowhere Lane', destination: 'Lighthouse Lane' })
    ).rejects.toMatchObject({ code: 'APPLICATION_PERMANENT', apiStatus: 'NOT_FOUND' });
    expect(attempts).toEqual([1]);
  });
});
