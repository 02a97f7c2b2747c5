import type { SlotValue } from '../../domain/entities/Slot.js';
import type {
  EmissionAlternative,
  EmissionsEstimate,
  SustainabilityGrade,
} from '../../domain/entities/ToolResult.js';
import { ToolInputError, type IToolHandler, type ToolInputs } from '../../domain/ports/IToolHandler.js';

export type EmissionMode = 'flight' | 'train' | 'car' | 'bus';

/** kg CO2e per passenger-km; car is per vehicle-km and shared between passengers */
const MODES: readonly EmissionMode[] = ['flight', 'train', 'car', 'bus'];

export const EMISSION_FACTORS: Record<EmissionMode, number> = {
  flight: 0.255,
  train: 0.041,
  car: 0.192,
  bus: 0.105,
};

/** kg CO2e per hotel night */
export const HOTEL_NIGHT_FACTOR = 15;

/** USD per kg CO2e offset */
export const OFFSET_PRICE_PER_KG = 0.02;

const GRADE_CEILINGS: Array<[number, SustainabilityGrade]> = [
  [50, 'A'],
  [100, 'B'],
  [200, 'C'],
  [400, 'D'],
  [800, 'E'],
];

const MODE_ALIASES: Record<string, EmissionMode> = {
  flight: 'flight',
  fly: 'flight',
  plane: 'flight',
  airplane: 'flight',
  train: 'train',
  rail: 'train',
  car: 'car',
  drive: 'car',
  driving: 'car',
  bus: 'bus',
  coach: 'bus',
};

export function sustainabilityGrade(totalKg: number): SustainabilityGrade {
  for (const [ceiling, grade] of GRADE_CEILINGS) {
    if (totalKg <= ceiling) return grade;
  }
  return 'F';
}

export function emissionMode(raw: string): EmissionMode | null {
  return MODE_ALIASES[raw.trim().toLowerCase()] ?? null;
}

/**
 * Numeric value of the `name` slot: its `value` attribute when numeric, otherwise its id
 */
export function numericSlotValue(name: string, slot: SlotValue): number {
  const attribute = slot.attributes.value;
  const parsed = typeof attribute === 'number' ? attribute : Number.parseFloat(slot.id);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ToolInputError(name, `Expected a non-negative number for "${slot.surfaceText}"`);
  }
  return parsed;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Travel emissions only; a car is counted once and shared between its passengers */
function travelKg(mode: EmissionMode, distanceKm: number, passengers: number): number {
  return mode === 'car' ? distanceKm * EMISSION_FACTORS.car : distanceKm * EMISSION_FACTORS[mode] * passengers;
}

/**
 * Other modes that would emit less for the same trip, lowest total first
 */
export function lowerEmissionAlternatives(
  mode: EmissionMode,
  distanceKm: number,
  passengers: number,
  nights: number
): EmissionAlternative[] {
  const hotelKg = nights * HOTEL_NIGHT_FACTOR;
  const currentKg = round(travelKg(mode, distanceKm, passengers) + hotelKg, 2);

  return MODES.filter((other) => other !== mode)
    .map((other) => {
      const totalKg = round(travelKg(other, distanceKm, passengers) + hotelKg, 2);
      return { mode: other, totalKg, savingKg: round(currentKg - totalKg, 2) };
    })
    .filter((alternative) => alternative.savingKg > 0)
    .sort((a, b) => a.totalKg - b.totalKg);
}

export function emissionRecommendations(
  mode: EmissionMode,
  totalKg: number,
  grade: SustainabilityGrade
): string[] {
  const recommendations: string[] = [];
  if (grade === 'A' || grade === 'B') {
    recommendations.push('Great job! Your trip is highly sustainable.');
  }
  if (mode === 'flight') {
    recommendations.push('Consider offsetting your flight emissions or using trains for shorter distances.');
  }
  if (totalKg > 200) {
    recommendations.push('Try to reduce car usage or choose eco-certified hotels.');
  }
  if (grade === 'E' || grade === 'F') {
    recommendations.push('Your trip has a high carbon footprint. Explore more sustainable options.');
  }
  return recommendations;
}

/**
 * Trip carbon footprint from local emission factors. No network access.
 */
export class EmissionsTool implements IToolHandler {
  readonly name = 'emissions';
  readonly capability = 'emissions estimate';
  readonly requiredInputs = [
    { name: 'travel_mode', entityType: 'travel_mode' },
    { name: 'distance_km', entityType: 'distance' },
  ];

  async execute(inputs: ToolInputs): Promise<EmissionsEstimate> {
    const { travel_mode: modeSlot, distance_km: distanceSlot } = inputs;
    if (!modeSlot || !distanceSlot) {
      throw new Error('Emissions estimate requires a travel mode and a distance');
    }

    const mode = emissionMode(modeSlot.id);
    if (!mode) {
      throw new ToolInputError('travel_mode', `No emission factor for travel mode "${modeSlot.surfaceText}"`);
    }

    const distanceKm = numericSlotValue('distance_km', distanceSlot);
    const passengers = inputs.passengers
      ? Math.max(1, Math.round(numericSlotValue('passengers', inputs.passengers)))
      : 1;
    const nights = inputs.nights ? Math.round(numericSlotValue('nights', inputs.nights)) : 0;

    const totalKg = round(travelKg(mode, distanceKm, passengers) + nights * HOTEL_NIGHT_FACTOR, 2);
    const grade = sustainabilityGrade(totalKg);

    return {
      kind: 'emissions',
      mode,
      distanceKm,
      passengers,
      nights,
      totalKg,
      grade,
      offsetKg: totalKg,
      offsetPriceUsd: round(totalKg * OFFSET_PRICE_PER_KG, 2),
      recommendations: emissionRecommendations(mode, totalKg, grade),
      alternatives: lowerEmissionAlternatives(mode, distanceKm, passengers, nights),
    };
  }
}
