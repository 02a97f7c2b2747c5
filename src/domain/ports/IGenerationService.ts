import type { ScoredChunk } from '../entities/DocumentChunk.js';

/**
 * Port for the text generator used to phrase grounded answers.
 * May be nondeterministic.
 */
export interface IGenerationService {
  generate(query: string, contextChunks: ScoredChunk[], signal?: AbortSignal): Promise<string>;
}
