import { describe, it, expect, vi, afterEach } from 'vitest';
import { Retriever } from '../src/retrieval/retriever.js';
import { InMemoryVectorStore } from '../src/store/memory-store.js';
import { ConfigurationError } from '../src/errors.js';
import type { ParentBlock } from '../src/types.js';
import { FAST_RETRY, keywordEmbedder, makeChunk, makeRecord, silenceStderr } from './fixtures.js';

async function seededStore(modelId = 'test-embed') {
  const store = new InMemoryVectorStore();
  await store.upsert(modelId, [
    makeRecord(makeChunk('vid1', 0, 'cache basics'), [1, 0], modelId),
    makeRecord(makeChunk('vid1', 1, 'rocket launch'), [0, 1], modelId),
  ]);
  return store;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Retriever', () => {
  it('returns every stored chunk, best first, when topK exceeds the count', async () => {
    const { embedder, embed } = keywordEmbedder();
    const retriever = new Retriever(embedder, await seededStore(), { storeRetry: FAST_RETRY });

    const result = await retriever.retrieve('how does the cache work', 4);

    expect(result.modelId).toBe('test-embed');
    expect(result.hits.map((h) => h.chunk.id)).toEqual(['vid1:0', 'vid1:1']);
    expect(result.hits.map((h) => h.score)).toEqual([1, 0]);
    expect(embed).toHaveBeenCalledWith(['how does the cache work']);
  });

  it('caps hits at topK', async () => {
    const { embedder } = keywordEmbedder();
    const retriever = new Retriever(embedder, await seededStore(), { storeRetry: FAST_RETRY });

    const result = await retriever.retrieve('rockets', 1);
    expect(result.hits.map((h) => h.chunk.id)).toEqual(['vid1:1']);
  });

  it('fails on a model mismatch without embedding the query', async () => {
    const { embedder, embed } = keywordEmbedder();
    const retriever = new Retriever(embedder, await seededStore('other-model'), { storeRetry: FAST_RETRY });

    await expect(retriever.retrieve('cache', 2)).rejects.toThrow(ConfigurationError);
    expect(embed).not.toHaveBeenCalled();
  });

  it('returns no hits from an empty store and logs a warning', async () => {
    const stderr = silenceStderr();
    const { embedder, embed } = keywordEmbedder();
    const retriever = new Retriever(embedder, new InMemoryVectorStore(), { storeRetry: FAST_RETRY });

    const result = await retriever.retrieve('cache', 3);

    expect(result.hits).toEqual([]);
    expect(embed).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledWith('WARN: empty-index: Vector store is empty; nothing to retrieve\n');
  });

  it('returns no hits for a blank query', async () => {
    silenceStderr();
    const { embedder, embed } = keywordEmbedder();
    const retriever = new Retriever(embedder, await seededStore(), { storeRetry: FAST_RETRY });

    expect((await retriever.retrieve('   ', 3)).hits).toEqual([]);
    expect(embed).not.toHaveBeenCalled();
  });

  it('rejects a non-positive topK', async () => {
    const { embedder } = keywordEmbedder();
    const retriever = new Retriever(embedder, await seededStore(), { storeRetry: FAST_RETRY });

    await expect(retriever.retrieve('cache', 0)).rejects.toThrow(ConfigurationError);
    await expect(retriever.retrieve('cache', 1.5)).rejects.toThrow(ConfigurationError);
  });

  it('attaches parent blocks in hierarchical mode', async () => {
    const { embedder } = keywordEmbedder();
    const store = new InMemoryVectorStore();
    const block: ParentBlock = {
      id: 'vid1:parent:0',
      sourceId: 'vid1',
      ordinal: 0,
      text: 'cache basics rocket launch',
      tokenCount: 4,
      start: 0,
      end: 26,
      childIds: ['vid1:0', 'vid1:1'],
    };
    await store.upsert(
      'test-embed',
      [
        makeRecord(makeChunk('vid1', 0, 'cache basics', { parentId: block.id }), [1, 0]),
        makeRecord(makeChunk('vid1', 1, 'rocket launch', { start: 13, parentId: block.id }), [0, 1]),
      ],
      [block],
    );

    const flat = new Retriever(embedder, store, { storeRetry: FAST_RETRY });
    const nested = new Retriever(embedder, store, { hierarchical: true, storeRetry: FAST_RETRY });

    expect((await flat.retrieve('cache', 1)).hits[0]?.parent).toBeUndefined();
    expect((await nested.retrieve('cache', 1)).hits[0]?.parent).toEqual(block);
  });
});
