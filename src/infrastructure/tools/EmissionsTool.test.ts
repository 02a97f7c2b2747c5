import { describe, it, expect } from 'vitest';
import {
  EmissionsTool,
  emissionMode,
  lowerEmissionAlternatives,
  numericSlotValue,
  sustainabilityGrade,
} from './EmissionsTool.js';
import type { SlotValue } from '../../domain/entities/Slot.js';
import { ToolInputError } from '../../domain/ports/IToolHandler.js';

function slot(entityType: string, id: string, attributes: SlotValue['attributes'] = {}): SlotValue {
  return { entityType, id, surfaceText: id, attributes };
}

describe('EmissionsTool', () => {
  const tool = new EmissionsTool();

  it('should multiply per-passenger factors by the number of travellers', async () => {
    const estimate = await tool.execute({
      travel_mode: slot('travel_mode', 'train'),
      distance_km: slot('distance', '300 km', { value: 300 }),
      passengers: slot('number', '2'),
    });

    expect(estimate).toEqual({
      kind: 'emissions',
      mode: 'train',
      distanceKm: 300,
      passengers: 2,
      nights: 0,
      totalKg: 24.6,
      grade: 'A',
      offsetKg: 24.6,
      offsetPriceUsd: 0.49,
      recommendations: ['Great job! Your trip is highly sustainable.'],
      alternatives: [],
    });
  });

  it('should count a car once whatever the number of passengers', async () => {
    const estimate = await tool.execute({
      travel_mode: slot('travel_mode', 'Driving'),
      distance_km: slot('distance', '500'),
      passengers: slot('number', '4'),
    });

    expect(estimate.mode).toBe('car');
    expect(estimate.totalKg).toBe(96);
    expect(estimate.grade).toBe('B');
  });

  it('should add hotel nights and recommend alternatives to flying', async () => {
    const estimate = await tool.execute({
      travel_mode: slot('travel_mode', 'plane'),
      distance_km: slot('distance', '1000'),
      nights: slot('number', '2'),
    });

    expect(estimate.totalKg).toBe(285);
    expect(estimate.grade).toBe('D');
    expect(estimate.offsetPriceUsd).toBe(5.7);
    expect(estimate.recommendations).toEqual([
      'Consider offsetting your flight emissions or using trains for shorter distances.',
      'Try to reduce car usage or choose eco-certified hotels.',
    ]);
    expect(estimate.alternatives).toEqual([
      { mode: 'train', totalKg: 71, savingKg: 214 },
      { mode: 'bus', totalKg: 135, savingKg: 150 },
      { mode: 'car', totalKg: 222, savingKg: 63 },
    ]);
  });

  it('should reject travel modes without an emission factor as bad travel_mode input', async () => {
    const failure = tool.execute({ travel_mode: slot('travel_mode', 'ferry'), distance_km: slot('distance', '10') });

    await expect(failure).rejects.toBeInstanceOf(ToolInputError);
    await expect(failure).rejects.toMatchObject({
      slot: 'travel_mode',
      message: 'No emission factor for travel mode "ferry"',
    });
  });

  it('should reject a negative distance as bad distance_km input', async () => {
    await expect(
      tool.execute({ travel_mode: slot('travel_mode', 'bus'), distance_km: slot('distance', '-40') })
    ).rejects.toMatchObject({ slot: 'distance_km', message: 'Expected a non-negative number for "-40"' });
  });
});

describe('sustainabilityGrade', () => {
  it.each([
    [50, 'A'],
    [50.01, 'B'],
    [200, 'C'],
    [400, 'D'],
    [800, 'E'],
    [801, 'F'],
  ])('should grade %s kg as %s', (totalKg, grade) => {
    expect(sustainabilityGrade(totalKg)).toBe(grade);
  });
});

describe('emissionMode', () => {
  it('should map aliases to a known mode', () => {
    expect(emissionMode(' Coach ')).toBe('bus');
    expect(emissionMode('rail')).toBe('train');
    expect(emissionMode('ferry')).toBeNull();
  });
});

describe('numericSlotValue', () => {
  it('should prefer a numeric value attribute over the id', () => {
    expect(numericSlotValue('distance_km', slot('distance', 'about 120 km', { value: 120 }))).toBe(120);
    expect(numericSlotValue('distance_km', slot('distance', '42.5km'))).toBe(42.5);
  });

  it('should reject negative or non-numeric values', () => {
    expect(() => numericSlotValue('distance_km', slot('distance', '-5'))).toThrow(
      'Expected a non-negative number for "-5"'
    );
    expect(() => numericSlotValue('nights', slot('number', 'far'))).toThrow(
      new ToolInputError('nights', 'Expected a non-negative number for "far"')
    );
  });
});

describe('lowerEmissionAlternatives', () => {
  it('should list the modes that emit less for a group, lowest first', () => {
    expect(lowerEmissionAlternatives('bus', 100, 4, 0)).toEqual([
      { mode: 'train', totalKg: 16.4, savingKg: 25.6 },
      { mode: 'car', totalKg: 19.2, savingKg: 22.8 },
    ]);
  });

  it('should be empty when the chosen mode already emits least', () => {
    expect(lowerEmissionAlternatives('train', 300, 1, 1)).toEqual([]);
  });
});
