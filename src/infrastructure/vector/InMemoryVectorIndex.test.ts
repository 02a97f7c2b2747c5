import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryVectorIndex, cosineSimilarity } from './InMemoryVectorIndex.js';

describe('InMemoryVectorIndex', () => {
  let index: InMemoryVectorIndex;

  beforeEach(async () => {
    index = new InMemoryVectorIndex(2);
    await index.upsert('rail#0', [1, 0], 'Trains emit far less than planes.', { source: 'rail-guide' });
    await index.upsert('tips#0', [0, 1], 'Pack a reusable bottle.', { source: 'tips' });
    await index.upsert('hotels#0', [1, 1], 'Look for eco-certified hotels.', { source: 'eco-hotels' });
  });

  it('should return the top k chunks by cosine similarity', async () => {
    const hits = await index.query([1, 0], 2);

    expect(hits.map((hit) => hit.chunkId)).toEqual(['rail#0', 'hotels#0']);
    expect(hits[0]).toEqual({
      chunkId: 'rail#0',
      similarity: 1,
      text: 'Trains emit far less than planes.',
      metadata: { source: 'rail-guide' },
    });
    expect(hits[1].similarity).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it('should break similarity ties by chunk id', async () => {
    await index.upsert('alpha#0', [3, 0], 'Same direction, longer vector.', {});

    const hits = await index.query([1, 0], 2);

    expect(hits.map((hit) => hit.chunkId)).toEqual(['alpha#0', 'rail#0']);
  });

  it('should return nothing for k of zero', async () => {
    expect(await index.query([1, 0], 0)).toEqual([]);
  });

  it('should replace a chunk upserted under the same id', async () => {
    await index.upsert('tips#0', [1, 0], 'Travel light.', { source: 'tips' });

    expect(await index.size()).toBe(3);
    const hits = await index.query([1, 0], 3);
    expect(hits.find((hit) => hit.chunkId === 'tips#0')?.text).toBe('Travel light.');
  });

  it('should reject vectors of the wrong dimension', async () => {
    await expect(index.upsert('bad#0', [1, 0, 0], 'Too long.', {})).rejects.toThrow(
      'Vector for bad#0 has dimension 3, index expects 2'
    );
    expect(await index.size()).toBe(3);
  });

  it('should not be affected by later changes to the caller vector', async () => {
    const vector = [0, 1];
    await index.upsert('walk#0', vector, 'Walk the old town.', {});
    vector[0] = 1;
    vector[1] = 0;

    const hits = await index.query([0, 1], 4);

    expect(hits.find((hit) => hit.chunkId === 'walk#0')?.similarity).toBe(1);
  });
});

describe('cosineSimilarity', () => {
  it('should be zero for mismatched or zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([1, 0], [0, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });

  it('should be one for parallel vectors', () => {
    expect(cosineSimilarity([2, 4], [1, 2])).toBeCloseTo(1, 10);
  });
});
