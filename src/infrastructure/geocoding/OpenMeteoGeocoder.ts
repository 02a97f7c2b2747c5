import { z } from 'zod';
import type { GeocodedPlace, IGeocoder } from '../../domain/ports/IGeocoder.js';
import type { SlotValue } from '../../domain/entities/Slot.js';
import { describeSlotValue } from '../../domain/entities/Slot.js';
import { fetchParsed, type FetchFn } from '../utils/http.js';

export const DEFAULT_GEOCODING_URL = 'https://geocoding-api.open-meteo.com/v1/search';

/** Open-Meteo omits `results` when nothing matches */
export const geocodingResponseSchema = z.object({
  results: z
    .array(
      z.object({
        name: z.string().optional(),
        latitude: z.number(),
        longitude: z.number(),
        country: z.string().optional(),
      })
    )
    .default([]),
});

export type GeocodingResponse = z.infer<typeof geocodingResponseSchema>;

/**
 * Open-Meteo geocoding (no API key)
 */
export class OpenMeteoGeocoder implements IGeocoder {
  constructor(
    private readonly baseUrl: string = DEFAULT_GEOCODING_URL,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  async geocode(name: string, signal?: AbortSignal): Promise<GeocodedPlace> {
    const url = new URL(this.baseUrl);
    url.searchParams.set('name', name);
    url.searchParams.set('count', '1');

    const { results } = await fetchParsed(this.fetchFn, 'geocoding', url, geocodingResponseSchema, { signal });
    const [first] = results;
    if (!first) {
      throw new Error(`No location found: ${name}`);
    }

    return {
      name: first.name ?? name,
      latitude: first.latitude,
      longitude: first.longitude,
      country: first.country,
    };
  }
}

/**
 * Coordinates of a place slot: taken from its attributes when present, geocoded otherwise
 */
export async function locatePlace(
  place: SlotValue,
  geocoder: IGeocoder,
  signal?: AbortSignal
): Promise<GeocodedPlace> {
  const { latitude, longitude } = place.attributes;
  const name = describeSlotValue(place);
  if (typeof latitude === 'number' && typeof longitude === 'number') {
    return { name, latitude, longitude };
  }
  const found = await geocoder.geocode(place.surfaceText, signal);
  return { ...found, name };
}
