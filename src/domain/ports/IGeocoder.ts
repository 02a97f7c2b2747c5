/**
 * Coordinates for a named place
 */
export interface GeocodedPlace {
  name: string;
  latitude: number;
  longitude: number;
  country?: string;
}

/**
 * Port for place-name lookup, used when a resolved place carries no coordinates
 */
export interface IGeocoder {
  geocode(name: string, signal?: AbortSignal): Promise<GeocodedPlace>;
}
