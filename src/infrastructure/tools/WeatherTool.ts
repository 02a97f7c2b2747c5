import { z } from 'zod';
import type { WeatherReport } from '../../domain/entities/ToolResult.js';
import type { IGeocoder } from '../../domain/ports/IGeocoder.js';
import { ToolInputError, type IToolHandler, type ToolInputs } from '../../domain/ports/IToolHandler.js';
import { locatePlace } from '../geocoding/OpenMeteoGeocoder.js';
import { fetchParsed, type FetchFn } from '../utils/http.js';

export const DEFAULT_WEATHER_URL = 'https://api.open-meteo.com/v1/forecast';

// Open-Meteo sends null for days a variable isn't available
const dailySeries = z.array(z.number().nullable()).optional();

export const forecastResponseSchema = z.object({
  daily: z
    .object({
      time: z.array(z.string()),
      temperature_2m_min: dailySeries,
      temperature_2m_max: dailySeries,
      precipitation_probability_max: dailySeries,
      weathercode: dailySeries,
      relative_humidity_2m_max: dailySeries,
      wind_speed_10m_max: dailySeries,
    })
    .optional(),
});

export type DailyForecast = NonNullable<z.infer<typeof forecastResponseSchema>['daily']>;
type DailyVariable = Exclude<keyof DailyForecast, 'time'>;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** Map WMO weather code to short condition string */
export function weatherCodeToCondition(code: number): string {
  if (code === 0) return 'Clear';
  if (code >= 1 && code <= 3) return 'Mainly clear to cloudy';
  if (code >= 45 && code <= 48) return 'Foggy';
  if (code >= 51 && code <= 67) return 'Rain';
  if (code >= 71 && code <= 77) return 'Snow';
  if (code >= 80 && code <= 82) return 'Rain showers';
  if (code >= 85 && code <= 86) return 'Snow showers';
  if (code >= 95 && code <= 99) return 'Thunderstorm';
  return 'Variable';
}

/**
 * Packing and activity tips for a day's mean temperature (°C), humidity (%) and wind (m/s)
 */
export function weatherRecommendations(
  temperature: number,
  humidity?: number,
  windSpeed?: number
): string[] {
  let recommendations: string[];
  if (temperature < 5) {
    recommendations = [
      'Pack warm, layered clothing',
      'Consider indoor sustainable activities',
      'Hot drinks from local cafes reduce energy consumption',
    ];
  } else if (temperature < 15) {
    recommendations = [
      'Perfect weather for hiking and outdoor exploration',
      'Ideal for walking tours and cycling',
      'Layer clothing for temperature changes',
    ];
  } else if (temperature < 25) {
    recommendations = [
      'Excellent weather for most outdoor activities',
      'Great for walking and public transportation',
      'Perfect for exploring local markets',
    ];
  } else {
    recommendations = [
      'Stay hydrated and seek shade during peak hours',
      'Early morning and evening activities recommended',
      'Use sun protection and light clothing',
    ];
  }

  if (humidity !== undefined && humidity > 80) {
    recommendations.push('High humidity - choose breathable, quick-dry clothing');
  }
  if (windSpeed !== undefined && windSpeed > 10) {
    recommendations.push('Windy conditions - secure loose items and dress appropriately');
  }
  return recommendations;
}

function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Daily forecast for a place via Open-Meteo
 */
export class WeatherTool implements IToolHandler {
  readonly name = 'weather';
  readonly capability = 'weather';
  readonly requiredInputs = [{ name: 'location', entityType: 'place' }];

  constructor(
    private readonly geocoder: IGeocoder,
    private readonly baseUrl: string = DEFAULT_WEATHER_URL,
    private readonly fetchFn: FetchFn = fetch,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async execute(inputs: ToolInputs, signal?: AbortSignal): Promise<WeatherReport> {
    const location = inputs.location;
    if (!location) {
      throw new Error('Weather lookup requires a location');
    }

    const date = this.resolveDate(inputs);
    const place = await locatePlace(location, this.geocoder, signal);

    const url = new URL(this.baseUrl);
    url.searchParams.set('latitude', String(place.latitude));
    url.searchParams.set('longitude', String(place.longitude));
    url.searchParams.set(
      'daily',
      'temperature_2m_min,temperature_2m_max,precipitation_probability_max,weathercode,relative_humidity_2m_max,wind_speed_10m_max'
    );
    url.searchParams.set('wind_speed_unit', 'ms');
    url.searchParams.set('timezone', 'auto');
    url.searchParams.set('start_date', date);
    url.searchParams.set('end_date', date);

    const { daily } = await fetchParsed(this.fetchFn, 'weather', url, forecastResponseSchema, { signal });
    const index = daily ? this.dayIndex(daily, date) : -1;
    if (!daily || index < 0) {
      throw new Error(`No forecast for ${place.name} on ${date}`);
    }
    const valueOf = (variable: DailyVariable): number | undefined => daily[variable]?.[index] ?? undefined;

    const temperatureMin = valueOf('temperature_2m_min') ?? 0;
    const temperatureMax = valueOf('temperature_2m_max') ?? 0;
    const probability = (valueOf('precipitation_probability_max') ?? 0) / 100;
    const code = valueOf('weathercode') ?? -1;

    return {
      kind: 'weather',
      location: place.name,
      date,
      temperatureMin,
      temperatureMax,
      condition: weatherCodeToCondition(code),
      precipitationProbability: Math.min(1, Math.max(0, probability)),
      recommendations: weatherRecommendations(
        (temperatureMin + temperatureMax) / 2,
        valueOf('relative_humidity_2m_max'),
        valueOf('wind_speed_10m_max')
      ),
    };
  }

  private resolveDate(inputs: ToolInputs): string {
    const slot = inputs.date;
    if (!slot) return toIsoDate(this.clock());

    const value = slot.attributes.value;
    if (typeof value === 'string' && ISO_DATE.test(value)) return value;
    if (ISO_DATE.test(slot.id)) return slot.id;

    const parsed = new Date(slot.id);
    if (Number.isNaN(parsed.getTime())) {
      throw new ToolInputError('date', `Unrecognized date: ${slot.surfaceText}`);
    }
    return toIsoDate(parsed);
  }

  private dayIndex(daily: DailyForecast, date: string): number {
    if (daily.time.length === 0) return -1;
    const index = daily.time.indexOf(date);
    return index >= 0 ? index : 0;
  }
}
