import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { OpenMeteoGeocoder, locatePlace } from './OpenMeteoGeocoder.js';
import type { FetchFn } from '../utils/http.js';
import type { IGeocoder } from '../../domain/ports/IGeocoder.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('OpenMeteoGeocoder', () => {
  let fetchFn: Mock<FetchFn>;
  let geocoder: OpenMeteoGeocoder;

  beforeEach(() => {
    fetchFn = vi.fn<FetchFn>(async () =>
      jsonResponse({ results: [{ name: 'Porto', latitude: 41.15, longitude: -8.61, country: 'Portugal' }] })
    );
    geocoder = new OpenMeteoGeocoder('http://geo.test/v1/search', fetchFn);
  });

  it('should return the first match', async () => {
    const place = await geocoder.geocode('porto');

    expect(place).toEqual({ name: 'Porto', latitude: 41.15, longitude: -8.61, country: 'Portugal' });
    expect(String(fetchFn.mock.calls[0][0])).toBe('http://geo.test/v1/search?name=porto&count=1');
  });

  it('should fail when nothing matches', async () => {
    fetchFn.mockResolvedValueOnce(jsonResponse({ generationtime_ms: 0.2 }));

    await expect(geocoder.geocode('Atlantis')).rejects.toThrow('No location found: Atlantis');
  });

  it('should reject a match without coordinates', async () => {
    fetchFn.mockResolvedValueOnce(jsonResponse({ results: [{ name: 'Porto', latitude: '41.15' }] }));

    await expect(geocoder.geocode('Porto')).rejects.toThrow(
      'geocoding response is malformed: results[0].latitude Expected number, received string'
    );
  });

  it('should surface provider errors', async () => {
    fetchFn.mockResolvedValueOnce(jsonResponse({}, 500));

    await expect(geocoder.geocode('Porto')).rejects.toThrow('geocoding request failed with status 500');
  });
});

describe('locatePlace', () => {
  it('should use coordinates carried by the slot value', async () => {
    const geocoder: IGeocoder = { geocode: vi.fn() };

    const place = await locatePlace(
      { entityType: 'place', id: 'geo-lis', surfaceText: 'lisbon', attributes: { label: 'Lisbon', latitude: 38.72, longitude: -9.14 } },
      geocoder
    );

    expect(place).toEqual({ name: 'Lisbon', latitude: 38.72, longitude: -9.14 });
    expect(geocoder.geocode).not.toHaveBeenCalled();
  });

  it('should keep the slot label over the geocoded name', async () => {
    const geocoder: IGeocoder = {
      geocode: vi.fn(async () => ({ name: 'London', latitude: 42.98, longitude: -81.25, country: 'Canada' })),
    };

    const place = await locatePlace(
      { entityType: 'place', id: 'geo-on', surfaceText: 'London', attributes: { label: 'London, Ontario' } },
      geocoder
    );

    expect(place).toEqual({ name: 'London, Ontario', latitude: 42.98, longitude: -81.25, country: 'Canada' });
  });
});
