import type { ScoredChunk } from '../../domain/entities/DocumentChunk.js';
import type { IGenerationService } from '../../domain/ports/IGenerationService.js';

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Offline generator: answers with the leading sentences of the ranked context chunks
 */
export class ExtractiveGenerationService implements IGenerationService {
  constructor(private readonly maxSentences: number = 3) {}

  async generate(_query: string, contextChunks: ScoredChunk[]): Promise<string> {
    const sentences: string[] = [];
    for (const chunk of contextChunks) {
      for (const sentence of splitSentences(chunk.text).slice(0, 2)) {
        if (sentences.length >= this.maxSentences) break;
        sentences.push(sentence);
      }
      if (sentences.length >= this.maxSentences) break;
    }
    return sentences.join(' ');
  }
}
