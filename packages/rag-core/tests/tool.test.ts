import { describe, it, expect } from 'vitest';
import { createRetrievalTool } from '../src/retrieval/tool.js';
import { Retriever } from '../src/retrieval/retriever.js';
import { InMemoryVectorStore } from '../src/store/memory-store.js';
import { ConfigurationError } from '../src/errors.js';
import { FAST_RETRY, keywordEmbedder, makeChunk, makeRecord } from './fixtures.js';

describe('createRetrievalTool', () => {
  it('retrieves and assembles context in one call', async () => {
    const { embedder } = keywordEmbedder();
    const store = new InMemoryVectorStore();
    await store.upsert('test-embed', [
      makeRecord(makeChunk('vid1', 0, 'cache basics', { metadata: { title: 'Caching 101' } }), [1, 0]),
      makeRecord(makeChunk('vid2', 0, 'rocket launch'), [0, 1]),
    ]);
    const tool = createRetrievalTool(new Retriever(embedder, store, { storeRetry: FAST_RETRY }), {
      topK: 1,
      tokenBudget: 100,
    });

    const window = await tool.run('cache');

    expect(tool.name).toBe('search_transcripts');
    expect(window.text).toBe('[source: Caching 101]\ncache basics');
  });

  it('validates its settings at creation', () => {
    const { embedder } = keywordEmbedder();
    const retriever = new Retriever(embedder, new InMemoryVectorStore());

    expect(() => createRetrievalTool(retriever, { topK: 0, tokenBudget: 10 })).toThrow(ConfigurationError);
    expect(() => createRetrievalTool(retriever, { topK: 2, tokenBudget: -5 })).toThrow(ConfigurationError);
  });
});
