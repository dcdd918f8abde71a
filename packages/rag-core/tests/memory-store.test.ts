import { describe, it, expect } from 'vitest';
import { InMemoryVectorStore } from '../src/store/memory-store.js';
import { ConfigurationError } from '../src/errors.js';
import type { ParentBlock } from '../src/types.js';
import { makeChunk, makeRecord } from './fixtures.js';

function parent(sourceId: string, ordinal: number, childIds: string[]): ParentBlock {
  return {
    id: `${sourceId}:parent:${ordinal}`,
    sourceId,
    ordinal,
    text: 'block',
    tokenCount: 1,
    start: 0,
    end: 5,
    childIds,
  };
}

describe('InMemoryVectorStore', () => {
  it('starts empty with no recorded model', async () => {
    const store = new InMemoryVectorStore();
    expect(await store.getModelId()).toBeNull();
    expect(await store.search([1, 0], 5)).toEqual([]);
  });

  it('ranks by score and breaks ties by ordinal, then source id', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert('test-embed', [
      makeRecord(makeChunk('b', 0, 'b zero'), [1, 0]),
      makeRecord(makeChunk('a', 1, 'a one'), [1, 0]),
      makeRecord(makeChunk('a', 0, 'a zero'), [1, 0]),
      makeRecord(makeChunk('c', 0, 'c zero'), [0, 1]),
    ]);

    const results = await store.search([1, 0], 10);
    expect(results.map((r) => r.record.chunkId)).toEqual(['a:0', 'b:0', 'a:1', 'c:0']);
    expect(results.map((r) => r.score)).toEqual([1, 1, 1, 0]);
  });

  it('caps results at topK and returns all when topK exceeds the count', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert('test-embed', [
      makeRecord(makeChunk('a', 0, 'x'), [1, 0]),
      makeRecord(makeChunk('a', 1, 'y'), [0, 1]),
    ]);
    expect(await store.search([1, 0], 1)).toHaveLength(1);
    expect(await store.search([1, 0], 4)).toHaveLength(2);
  });

  it('replaces a source without leaving stale chunks or parents', async () => {
    const store = new InMemoryVectorStore();
    await store.replaceSource(
      'a',
      'test-embed',
      [0, 1, 2].map((n) => makeRecord(makeChunk('a', n, `a ${n}`), [1, 0])),
      [parent('a', 0, ['a:0', 'a:1', 'a:2'])],
    );
    await store.replaceSource('a', 'test-embed', [makeRecord(makeChunk('a', 0, 'a new'), [1, 0])], []);

    expect(await store.listChunkIds('a:')).toEqual(['a:0']);
    expect((await store.getParents(['a:parent:0'])).size).toBe(0);
    const [hit] = await store.search([1, 0], 1);
    expect(hit?.record.chunk.text).toBe('a new');
  });

  it('deletes by prefix without touching sources that share leading characters', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert('test-embed', [
      makeRecord(makeChunk('a', 0, 'x'), [1, 0]),
      makeRecord(makeChunk('a', 1, 'y'), [1, 0]),
      makeRecord(makeChunk('ab', 0, 'z'), [1, 0]),
    ]);

    expect(await store.deleteByPrefix('a:')).toBe(2);
    expect(await store.listChunkIds()).toEqual(['ab:0']);
  });

  it('refuses writes from a different embedding model', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert('model-a', [makeRecord(makeChunk('a', 0, 'x'), [1, 0], 'model-a')]);

    await expect(
      store.upsert('model-b', [makeRecord(makeChunk('b', 0, 'y'), [1, 0], 'model-b')]),
    ).rejects.toThrow(ConfigurationError);
    await expect(store.replaceSource('a', 'model-b', [], [])).rejects.toThrow(ConfigurationError);
  });

  it('forgets its model once emptied', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert('model-a', [makeRecord(makeChunk('a', 0, 'x'), [1, 0], 'model-a')]);
    await store.deleteByPrefix('a:');

    expect(await store.getModelId()).toBeNull();
    await store.upsert('model-b', [makeRecord(makeChunk('b', 0, 'y'), [1, 0], 'model-b')]);
    expect(await store.getModelId()).toBe('model-b');
  });

  it('returns only the parents that exist', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert('test-embed', [makeRecord(makeChunk('a', 0, 'x'), [1, 0])], [parent('a', 0, ['a:0'])]);

    const found = await store.getParents(['a:parent:0', 'a:parent:9']);
    expect([...found.keys()]).toEqual(['a:parent:0']);
  });

  it('reports per-source counts', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert(
      'test-embed',
      [
        makeRecord(makeChunk('b', 0, 'x'), [1, 0]),
        makeRecord(makeChunk('a', 0, 'y'), [1, 0]),
        makeRecord(makeChunk('a', 1, 'z'), [1, 0]),
      ],
      [parent('a', 0, ['a:0', 'a:1'])],
    );

    expect(await store.stats()).toEqual({
      modelId: 'test-embed',
      chunkCount: 3,
      parentCount: 1,
      sources: [
        { sourceId: 'a', chunkCount: 2 },
        { sourceId: 'b', chunkCount: 1 },
      ],
    });
  });
});
