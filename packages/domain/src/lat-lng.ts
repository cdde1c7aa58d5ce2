import { z } from 'zod';

const DECIMAL_DEGREE_PLACES = 7;

const latSchema = z
  .number({ invalid_type_error: 'Latitude must be a number' })
  .gte(-90, 'Latitude must be >= -90')
  .lte(90, 'Latitude must be <= 90');

const lngSchema = z
  .number({ invalid_type_error: 'Longitude must be a number' })
  .gte(-180, 'Longitude must be >= -180')
  .lte(180, 'Longitude must be <= 180');

export const LatLngSchema = z.object({
  lat: latSchema,
  lng: lngSchema
});

export const BoundsSchema = z.object({
  southwest: LatLngSchema,
  northeast: LatLngSchema
});

export type LatLng = z.infer<typeof LatLngSchema>;
export type Bounds = z.infer<typeof BoundsSchema>;

/**
 * Formats a coordinate with at most seven decimal places (about 1 cm), dropping trailing zeros.
 */
export function formatDecimalDegrees(value: number): string {
  const fixed = value.toFixed(DECIMAL_DEGREE_PLACES);
  const trimmed = fixed.replace(/0+$/, '').replace(/\.$/, '');
  return trimmed === '-0' ? '0' : trimmed;
}

export function formatLatLng(latLng: LatLng): string {
  return `${formatDecimalDegrees(latLng.lat)},${formatDecimalDegrees(latLng.lng)}`;
}

/**
 * Pipe-separated list of coordinates, as used by the `locations` and `path` parameters.
 */
export function formatLatLngList(points: readonly LatLng[]): string {
  return points.map(formatLatLng).join('|');
}

export function formatBounds(bounds: Bounds): string {
  return `${formatLatLng(bounds.southwest)}|${formatLatLng(bounds.northeast)}`;
}

export function parseLatLng(input: string): LatLng {
  const [rawLat, rawLng, ...rest] = input.split(',').map((part) => part.trim());

  if (rest.length > 0 || !rawLat || !rawLng) {
    throw new z.ZodError([
      {
        code: z.ZodIssueCode.custom,
        message: `Expected "lat,lng" but received "${input}"`,
        path: []
      }
    ]);
  }

  return LatLngSchema.parse({ lat: Number(rawLat), lng: Number(rawLng) });
}
