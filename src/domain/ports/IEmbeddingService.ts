/**
 * Port for the embedding model. Deterministic for a given model version.
 */
export interface IEmbeddingService {
  readonly dimension: number;

  /** `signal` aborts the request when the caller's time bound expires */
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}
