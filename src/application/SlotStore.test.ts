import { describe, it, expect, beforeEach } from 'vitest';
import { SlotStore } from './SlotStore.js';
import type { IntentSchema } from '../domain/entities/IntentSchema.js';
import type { SlotValue } from '../domain/entities/Slot.js';

const planRoute: IntentSchema = {
  intent: 'plan_route',
  required: [
    { name: 'origin', entityType: 'place', prompt: 'Where from?', label: 'starting point' },
    { name: 'destination', entityType: 'place', prompt: 'Where to?', label: 'destination' },
  ],
  optional: [{ name: 'travel_mode', entityType: 'travel_mode', prompt: 'How?', label: 'travel mode' }],
  target: { kind: 'tool', tool: 'routing' },
};

function placeValue(id: string, label: string): SlotValue {
  return { entityType: 'place', id, surfaceText: label, attributes: { label } };
}

describe('SlotStore', () => {
  let store: SlotStore;

  beforeEach(() => {
    store = new SlotStore();
  });

  it('should read back a filled value', () => {
    const value = placeValue('geo-1', 'Lisbon');
    store.fill('origin', value);

    expect(store.get('origin')).toEqual({ name: 'origin', status: 'filled', value });
    expect(store.isFilled('origin')).toBe(true);
  });

  it('should report unset after clear', () => {
    store.fill('origin', placeValue('geo-1', 'Lisbon'));
    store.clear('origin');

    expect(store.get('origin')).toEqual({ name: 'origin', status: 'unset' });
  });

  it('should let the last write win', () => {
    store.fill('origin', placeValue('geo-1', 'Lisbon'));
    store.fill('origin', placeValue('geo-2', 'Porto'));

    expect(store.filledValues().origin.id).toBe('geo-2');
  });

  it('should move a pending slot to filled on fill', () => {
    store.markPending('origin');
    expect(store.get('origin')).toEqual({ name: 'origin', status: 'pending' });

    store.fill('origin', placeValue('geo-1', 'Lisbon'));
    expect(store.get('origin').status).toBe('filled');
  });

  it('should list missing required slots in schema order', () => {
    expect(store.missingRequired(planRoute)).toEqual(['origin', 'destination']);

    store.fill('destination', placeValue('geo-3', 'Madrid'));
    expect(store.missingRequired(planRoute)).toEqual(['origin']);
  });

  it('should treat pending and mistyped slots as missing', () => {
    store.markPending('origin');
    store.fill('destination', { entityType: 'date', id: '2025-06-01', surfaceText: 'June 1st', attributes: {} });

    expect(store.missingRequired(planRoute)).toEqual(['origin', 'destination']);
  });

  it('should keep its own copy of filled values', () => {
    const value = placeValue('geo-1', 'Lisbon');
    store.fill('origin', value);
    value.attributes.label = 'Changed';

    expect(store.filledValues().origin.attributes.label).toBe('Lisbon');
  });

  it('should restore a snapshot', () => {
    store.fill('origin', placeValue('geo-1', 'Lisbon'));
    const snapshot = store.snapshot();

    store.clearAll();
    store.fill('destination', placeValue('geo-3', 'Madrid'));
    store.restore(snapshot);

    expect(store.filledNames()).toEqual(['origin']);
  });
});
