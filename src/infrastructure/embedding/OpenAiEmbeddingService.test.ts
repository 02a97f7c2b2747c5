import { describe, it, expect, vi } from 'vitest';
import { OpenAiEmbeddingService, type EmbeddingsApi } from './OpenAiEmbeddingService.js';

function fakeClient(data: Array<{ embedding: number[] }>): EmbeddingsApi {
  return { embeddings: { create: vi.fn(async () => ({ data })) } };
}

describe('OpenAiEmbeddingService', () => {
  it('should embed the text with the configured model', async () => {
    const client = fakeClient([{ embedding: [0.1, 0.2, 0.3] }]);
    const service = new OpenAiEmbeddingService(
      { apiKey: 'test-secret', model: 'text-embedding-3-small', dimension: 3 },
      client
    );

    expect(await service.embed('Night trains')).toEqual([0.1, 0.2, 0.3]);
    expect(client.embeddings.create).toHaveBeenCalledWith(
      { model: 'text-embedding-3-small', input: 'Night trains' },
      { signal: undefined }
    );
    expect(service.dimension).toBe(3);
  });

  it('should pass the abort signal to the request', async () => {
    const client = fakeClient([{ embedding: [1, 0] }]);
    const service = new OpenAiEmbeddingService({ apiKey: 'test-secret', model: 'text-embedding-3-small' }, client);
    const controller = new AbortController();

    await service.embed('Night trains', controller.signal);

    expect(client.embeddings.create).toHaveBeenCalledWith(
      { model: 'text-embedding-3-small', input: 'Night trains' },
      { signal: controller.signal }
    );
  });

  it('should default to the small model dimension', () => {
    const service = new OpenAiEmbeddingService({ apiKey: 'test-secret', model: 'text-embedding-3-small' }, fakeClient([]));

    expect(service.dimension).toBe(1536);
  });

  it('should fail when no vector comes back', async () => {
    const service = new OpenAiEmbeddingService({ apiKey: 'test-secret', model: 'text-embedding-3-small' }, fakeClient([]));

    await expect(service.embed('Night trains')).rejects.toThrow('Embedding model text-embedding-3-small returned no vector');
  });
});
