import type { ChunkMetadata, ScoredChunk } from '../entities/DocumentChunk.js';

/**
 * Port for the shared, read-mostly vector index
 */
export interface IVectorIndex {
  /**
   * Top-k chunks by cosine similarity, highest first, ties broken by chunk id
   */
  query(vector: readonly number[], k: number): Promise<ScoredChunk[]>;

  /**
   * Administrative write path. Must not block concurrent queries.
   */
  upsert(chunkId: string, vector: readonly number[], text: string, metadata: ChunkMetadata): Promise<void>;

  size(): Promise<number>;
}
