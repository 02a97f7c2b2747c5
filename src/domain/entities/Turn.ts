/**
 * Attribute values attached to a candidate resolution (region, country, population, coordinates...)
 */
export type CandidateAttributes = Record<string, string | number>;

/**
 * A possible real-world resolution of an extracted entity
 */
export interface CandidateResolution {
  /** Stable external identifier (e.g. geonames id) */
  id: string;
  attributes: CandidateAttributes;
  confidence: number;
}

/**
 * Entity type extracted by the NLU front-end
 */
export type EntityType =
  | 'place'
  | 'date'
  | 'duration'
  | 'travel_mode'
  | 'distance'
  | 'number'
  | string;

/**
 * Structured value extracted from the user's text
 */
export interface ExtractedEntity {
  type: EntityType;
  surfaceText: string;
  /** Optional role hint from the classifier (e.g. "origin" / "destination") */
  role?: string;
  candidates: readonly CandidateResolution[];
  confidence: number;
}

/**
 * Output of the NLU classifier for one message
 */
export interface ClassifiedMessage {
  intent: string;
  entities: ExtractedEntity[];
}

/**
 * Immutable record of one user message
 */
export interface Turn {
  readonly intent: string;
  readonly entities: readonly ExtractedEntity[];
  readonly text: string;
  readonly timestamp: Date;
}

/**
 * Build a frozen turn from a classified message
 */
export function createTurn(
  classified: ClassifiedMessage,
  text: string,
  timestamp: Date = new Date()
): Turn {
  const entities = classified.entities.map((entity) =>
    Object.freeze({
      ...entity,
      candidates: Object.freeze(
        entity.candidates.map((candidate) =>
          Object.freeze({ ...candidate, attributes: Object.freeze({ ...candidate.attributes }) })
        )
      ),
    })
  );

  return Object.freeze({
    intent: classified.intent,
    entities: Object.freeze(entities),
    text,
    timestamp,
  });
}
