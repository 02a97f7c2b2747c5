import type { ChunkMetadata, DocumentChunk, ScoredChunk } from '../../domain/entities/DocumentChunk.js';
import type { IVectorIndex } from '../../domain/ports/IVectorIndex.js';

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/**
 * Exact cosine search over an in-process snapshot.
 * Writes build a new snapshot and swap it in, so a running query keeps reading the one it started with.
 */
export class InMemoryVectorIndex implements IVectorIndex {
  private snapshot: ReadonlyMap<string, DocumentChunk> = new Map();

  constructor(private readonly dimension?: number) {}

  async query(vector: readonly number[], k: number): Promise<ScoredChunk[]> {
    if (k <= 0) return [];
    const chunks = this.snapshot;

    const scored: ScoredChunk[] = [];
    for (const chunk of chunks.values()) {
      scored.push({
        chunkId: chunk.id,
        similarity: cosineSimilarity(vector, chunk.embedding),
        text: chunk.text,
        metadata: chunk.metadata,
      });
    }

    scored.sort((a, b) => {
      if (a.similarity !== b.similarity) return b.similarity - a.similarity;
      if (a.chunkId < b.chunkId) return -1;
      if (a.chunkId > b.chunkId) return 1;
      return 0;
    });
    return scored.slice(0, k);
  }

  async upsert(
    chunkId: string,
    vector: readonly number[],
    text: string,
    metadata: ChunkMetadata
  ): Promise<void> {
    if (this.dimension !== undefined && vector.length !== this.dimension) {
      throw new Error(`Vector for ${chunkId} has dimension ${vector.length}, index expects ${this.dimension}`);
    }

    const chunk: DocumentChunk = Object.freeze({
      id: chunkId,
      embedding: Object.freeze([...vector]),
      text,
      metadata: Object.freeze({ ...metadata }),
    });

    const next = new Map(this.snapshot);
    next.set(chunkId, chunk);
    this.snapshot = next;
  }

  async size(): Promise<number> {
    return this.snapshot.size;
  }
}
