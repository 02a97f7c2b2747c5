import { z } from 'zod';
import type {
  CandidateAttributes,
  CandidateResolution,
  ClassifiedMessage,
  ExtractedEntity,
} from '../../domain/entities/Turn.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { INluClassifier } from '../../domain/ports/INluClassifier.js';
import { fetchJson, type FetchFn } from '../utils/http.js';
import { describeIssues, parseEach } from '../utils/validation.js';

/**
 * Raised when the classifier answers with a body that doesn't follow the contract
 */
export class NluContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NluContractError';
  }
}

const candidateSchema = z.object({
  id: z.union([z.string().min(1), z.number().transform(String)]),
  attributes: z.record(z.unknown()).optional(),
  confidence: z.number().default(0),
});

const entitySchema = z.object({
  type: z.string().min(1),
  surface_text: z.string(),
  role: z.string().optional(),
  confidence: z.number().optional(),
  candidates: z.array(z.unknown()).default([]),
});

export const classificationResponseSchema = z.object(
  {
    intent: z
      .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
      .min(1, 'must not be empty'),
    entities: z.array(z.unknown()).default([]),
  },
  { invalid_type_error: 'Classifier response is not an object' }
);

export type ClassificationResponse = z.infer<typeof classificationResponseSchema>;
type EntityPayload = z.infer<typeof entitySchema>;
type CandidatePayload = z.infer<typeof candidateSchema>;

function toAttributes(raw: Record<string, unknown> = {}): CandidateAttributes {
  const attributes: CandidateAttributes = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))) {
      attributes[key] = value;
    }
  }
  return attributes;
}

function toCandidate(raw: CandidatePayload): CandidateResolution {
  return { id: raw.id, attributes: toAttributes(raw.attributes), confidence: raw.confidence };
}

function toEntity(raw: EntityPayload): ExtractedEntity {
  const candidates = parseEach(candidateSchema, raw.candidates).map(toCandidate);
  return {
    type: raw.type,
    surfaceText: raw.surface_text,
    ...(raw.role && { role: raw.role }),
    candidates,
    confidence: raw.confidence ?? candidates.reduce((best, candidate) => Math.max(best, candidate.confidence), 0),
  };
}

/**
 * Map the classifier's snake_case JSON to a ClassifiedMessage.
 * Malformed entities and candidates are dropped; a missing intent is a contract violation.
 */
export function parseClassification(body: unknown): ClassifiedMessage {
  const result = classificationResponseSchema.safeParse(body);
  if (!result.success) {
    throw new NluContractError(describeIssues(result.error));
  }
  return {
    intent: result.data.intent,
    entities: parseEach(entitySchema, result.data.entities).map(toEntity),
  };
}

/**
 * NLU classifier reached over HTTP: POST { text } and read { intent, entities }
 */
export class HttpNluClassifier implements INluClassifier {
  private readonly logger: ILogger;

  constructor(
    private readonly url: string,
    logger: ILogger,
    private readonly fetchFn: FetchFn = fetch
  ) {
    this.logger = logger.child({ component: 'HttpNluClassifier' });
  }

  async classify(text: string, signal?: AbortSignal): Promise<ClassifiedMessage> {
    const body = await fetchJson(this.fetchFn, 'nlu', this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text }),
      signal,
    });

    const classified = parseClassification(body);
    this.logger.debug('Message classified', {
      intent: classified.intent,
      entities: classified.entities.map((entity) => entity.type),
    });
    return classified;
  }
}
