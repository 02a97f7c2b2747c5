import type { IEmbeddingService } from '../../domain/ports/IEmbeddingService.js';

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter(Boolean);
}

/**
 * Deterministic feature-hashing embedding, L2-normalized. Works offline.
 */
export class HashingEmbeddingService implements IEmbeddingService {
  constructor(readonly dimension: number = 256) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new Error(`Embedding dimension must be a positive integer, got ${dimension}`);
    }
  }

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimension).fill(0);

    for (const token of tokenize(text)) {
      let hash = 0;
      for (let i = 0; i < token.length; i++) {
        hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
      }
      vector[hash % this.dimension] += 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
    if (norm === 0) return vector;
    return vector.map((x) => x / norm);
  }
}
