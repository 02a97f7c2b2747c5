import { z } from 'zod';
import type { ChunkMetadata } from '../domain/entities/DocumentChunk.js';

const requiredText = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .refine((value) => value.trim().length > 0, 'is required');

// POST /api/conversation
export const conversationRequestSchema = z.object(
  {
    session_id: requiredText,
    message_text: requiredText,
  },
  { invalid_type_error: 'Request body must be a JSON object' }
);

export type ConversationRequest = z.infer<typeof conversationRequestSchema>;

/** Metadata keeps only scalar values; nested ones are dropped */
const metadataSchema = z
  .record(z.unknown(), { invalid_type_error: 'must be an object' })
  .transform((raw): ChunkMetadata => {
    const metadata: ChunkMetadata = {};
    for (const [key, value] of Object.entries(raw)) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        metadata[key] = value;
      }
    }
    return metadata;
  });

const documentSchema = z.object(
  {
    id: z.string({ required_error: 'is required', invalid_type_error: 'must be a string' }),
    text: z.string({ required_error: 'is required', invalid_type_error: 'must be a string' }),
    metadata: metadataSchema.optional(),
  },
  { invalid_type_error: 'must be an object' }
);

// POST /api/knowledge
export const knowledgeRequestSchema = z.object(
  {
    documents: z
      .array(documentSchema, {
        required_error: 'must be a non-empty array',
        invalid_type_error: 'must be a non-empty array',
      })
      .min(1, 'must be a non-empty array'),
  },
  { invalid_type_error: 'Request body must be a JSON object' }
);

export type KnowledgeRequest = z.infer<typeof knowledgeRequestSchema>;
