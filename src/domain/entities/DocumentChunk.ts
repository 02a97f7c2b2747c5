import type { ErrorKind } from './ToolResult.js';

export type ChunkMetadata = Record<string, string | number | boolean>;

/**
 * Unit of indexed source text. Immutable once indexed.
 */
export interface DocumentChunk {
  readonly id: string;
  readonly embedding: readonly number[];
  readonly text: string;
  readonly metadata: ChunkMetadata;
}

/**
 * Index hit returned by a similarity query
 */
export interface ScoredChunk {
  chunkId: string;
  similarity: number;
  text: string;
  metadata: ChunkMetadata;
}

/**
 * Chunks selected for one query, in rank order, within the context budget
 */
export interface RetrievalContext {
  chunks: ScoredChunk[];
  totalLength: number;
}

export type RetrievalFailureKind = Extract<
  ErrorKind,
  'EmptyIndex' | 'NoRelevantContext' | 'ToolTimeout' | 'ToolUnavailable'
>;

export type RetrievalResult =
  | {
      grounded: true;
      context: RetrievalContext;
      groundedAnswer: string;
      sources: string[];
    }
  | {
      grounded: false;
      context: RetrievalContext;
      errorKind: RetrievalFailureKind;
    };

/**
 * Raw document submitted on the ingestion path
 */
export interface SourceDocument {
  id: string;
  text: string;
  metadata?: ChunkMetadata;
}
