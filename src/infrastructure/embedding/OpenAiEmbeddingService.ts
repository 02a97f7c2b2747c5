import OpenAI from 'openai';
import type { IEmbeddingService } from '../../domain/ports/IEmbeddingService.js';

/**
 * The part of the OpenAI client this adapter calls
 */
export interface EmbeddingsApi {
  embeddings: {
    create(
      params: { model: string; input: string },
      options?: { signal?: AbortSignal }
    ): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export interface OpenAiEmbeddingOptions {
  apiKey: string;
  model: string;
  /** Dimension reported by the model (1536 for text-embedding-3-small) */
  dimension?: number;
}

export class OpenAiEmbeddingService implements IEmbeddingService {
  readonly dimension: number;
  private readonly client: EmbeddingsApi;

  constructor(
    private readonly options: OpenAiEmbeddingOptions,
    client?: EmbeddingsApi
  ) {
    this.dimension = options.dimension ?? 1536;
    this.client = client ?? new OpenAI({ apiKey: options.apiKey });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const response = await this.client.embeddings.create({ model: this.options.model, input: text }, { signal });
    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new Error(`Embedding model ${this.options.model} returned no vector`);
    }
    return embedding;
  }
}
