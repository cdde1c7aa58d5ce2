import { LatLngSchema, formatLatLng, normalizeAddress } from '@wayfarer/domain';
import { z } from 'zod';

export const TravelModeSchema = z.enum(['driving', 'walking', 'bicycling', 'transit']);
export const UnitSystemSchema = z.enum(['metric', 'imperial']);
export const AvoidSchema = z.enum(['tolls', 'highways', 'ferries', 'indoor']);
export const TrafficModelSchema = z.enum(['best_guess', 'optimistic', 'pessimistic']);

export type TravelMode = z.infer<typeof TravelModeSchema>;
export type UnitSystem = z.infer<typeof UnitSystemSchema>;
export type Avoid = z.infer<typeof AvoidSchema>;
export type TrafficModel = z.infer<typeof TrafficModelSchema>;

/**
 * A waypoint given as a free-form address, a coordinate or a Google place ID.
 * `|` separates places on the wire, so neither an address nor a place ID may contain one.
 */
export const PlaceSchema = z.union([
  z.string().min(1, 'Address must not be empty').regex(/^[^|]*$/, 'Address must not contain "|"'),
  LatLngSchema,
  z.object({ placeId: z.string().min(1).regex(/^[^|]*$/, 'Place ID must not contain "|"') })
]);

export type Place = z.infer<typeof PlaceSchema>;

export const DepartureTimeSchema = z.union([z.literal('now'), z.date()]);

export function formatPlace(place: Place): string {
  if (typeof place === 'string') {
    return normalizeAddress(place);
  }

  if ('placeId' in place) {
    return `place_id:${place.placeId}`;
  }

  return formatLatLng(place);
}

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1_000);
}

export function formatDepartureTime(time: 'now' | Date): string {
  return time === 'now' ? 'now' : String(toUnixSeconds(time));
}

export function formatAvoid(avoid: readonly Avoid[] | undefined): string | undefined {
  return avoid && avoid.length > 0 ? avoid.join('|') : undefined;
}

/**
 * Distance and duration pair as the legacy APIs report them: `value` in metres or seconds.
 */
export const TextValueSchema = z
  .object({
    text: z.string(),
    value: z.number()
  })
  .passthrough();
