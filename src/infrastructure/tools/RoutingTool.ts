import { z } from 'zod';
import type { RouteSummary } from '../../domain/entities/ToolResult.js';
import type { IGeocoder } from '../../domain/ports/IGeocoder.js';
import type { IToolHandler, ToolInputs } from '../../domain/ports/IToolHandler.js';
import { locatePlace } from '../geocoding/OpenMeteoGeocoder.js';
import { fetchParsed, type FetchFn } from '../utils/http.js';

export const DEFAULT_ROUTING_URL = 'https://router.project-osrm.org';

/** OSRM `/route/v1` answer; distance in metres, duration in seconds */
export const routeResponseSchema = z.object({
  code: z.string(),
  routes: z.array(z.object({ distance: z.number(), duration: z.number() })).default([]),
});

export type RouteResponse = z.infer<typeof routeResponseSchema>;

export type RoutingProfile = 'driving' | 'cycling' | 'foot';

const PROFILE_BY_MODE: Record<string, RoutingProfile> = {
  walk: 'foot',
  walking: 'foot',
  foot: 'foot',
  bike: 'cycling',
  bicycle: 'cycling',
  cycling: 'cycling',
};

export function routingProfile(mode: string): RoutingProfile {
  return PROFILE_BY_MODE[mode] ?? 'driving';
}

/**
 * Route distance and duration between two places via an OSRM-compatible API.
 * Modes without a road profile of their own (train, bus, flight) use the driving network.
 */
export class RoutingTool implements IToolHandler {
  readonly name = 'routing';
  readonly capability = 'route planning';
  readonly requiredInputs = [
    { name: 'origin', entityType: 'place' },
    { name: 'destination', entityType: 'place' },
  ];

  constructor(
    private readonly geocoder: IGeocoder,
    private readonly baseUrl: string = DEFAULT_ROUTING_URL,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  async execute(inputs: ToolInputs, signal?: AbortSignal): Promise<RouteSummary> {
    const { origin, destination } = inputs;
    if (!origin || !destination) {
      throw new Error('Routing requires an origin and a destination');
    }

    const mode = inputs.travel_mode ? inputs.travel_mode.id.trim().toLowerCase() : 'car';
    const [from, to] = await Promise.all([
      locatePlace(origin, this.geocoder, signal),
      locatePlace(destination, this.geocoder, signal),
    ]);

    const coordinates = `${from.longitude},${from.latitude};${to.longitude},${to.latitude}`;
    const url = new URL(`${this.baseUrl.replace(/\/+$/, '')}/route/v1/${routingProfile(mode)}/${coordinates}`);
    url.searchParams.set('overview', 'false');

    const { code, routes } = await fetchParsed(this.fetchFn, 'routing', url, routeResponseSchema, { signal });
    const [route] = routes;
    if (code !== 'Ok' || !route) {
      throw new Error(`No route found from ${from.name} to ${to.name} (${code})`);
    }

    return {
      kind: 'routing',
      origin: from.name,
      destination: to.name,
      mode,
      distanceKm: Math.round(route.distance / 100) / 10,
      durationMinutes: Math.round(route.duration / 60),
    };
  }
}
