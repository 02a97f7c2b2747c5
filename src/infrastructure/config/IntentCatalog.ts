import type { IntentCatalog, IntentSchema } from '../../domain/entities/IntentSchema.js';

const INTENTS: IntentSchema[] = [
  {
    intent: 'plan_route',
    required: [
      { name: 'origin', entityType: 'place', prompt: 'Where are you starting from?', label: 'starting point' },
      { name: 'destination', entityType: 'place', prompt: 'Where would you like to go?', label: 'destination' },
    ],
    optional: [
      {
        name: 'travel_mode',
        entityType: 'travel_mode',
        prompt: 'How would you like to travel?',
        label: 'travel mode',
      },
    ],
    target: { kind: 'tool', tool: 'routing' },
  },
  {
    intent: 'ask_weather',
    required: [
      {
        name: 'location',
        entityType: 'place',
        prompt: 'Which place would you like the forecast for?',
        label: 'location',
      },
    ],
    optional: [{ name: 'date', entityType: 'date', prompt: 'For which day?', label: 'date' }],
    target: { kind: 'tool', tool: 'weather' },
  },
  {
    intent: 'estimate_emissions',
    required: [
      {
        name: 'travel_mode',
        entityType: 'travel_mode',
        prompt: 'How will you travel: by train, bus, car or plane?',
        label: 'travel mode',
      },
      {
        name: 'distance_km',
        entityType: 'distance',
        prompt: 'Roughly how many kilometres is the trip?',
        label: 'trip distance',
      },
    ],
    optional: [
      { name: 'passengers', entityType: 'number', prompt: 'How many people are travelling?', label: 'number of travellers' },
      { name: 'nights', entityType: 'number', prompt: 'How many hotel nights?', label: 'number of nights' },
    ],
    target: { kind: 'tool', tool: 'emissions' },
  },
  {
    intent: 'ask_knowledge',
    required: [],
    optional: [],
    target: { kind: 'retrieval' },
  },
];

/**
 * Static intent table. Checked against the registered tools at startup.
 */
export function createIntentCatalog(schemas: IntentSchema[] = INTENTS): IntentCatalog {
  return new Map(schemas.map((schema) => [schema.intent, schema]));
}
