/**
 * FILE PURPOSE: Top-k retrieval with embedding-model verification and parent resolution
 *
 * WHY: Vectors from different models are not comparable and the scores would be
 *      silently wrong. The store's recorded model is checked before the query is
 *      embedded, so a mismatch costs no API call.
 * HOW: store model check → embed query → store.search → (parents) → ranked hits.
 *      Ranking: cosine score descending, ties by earliest chunk ordinal.
 */

import type { Embedder } from '../embedding/embedder.js';
import { withRetry, DEFAULT_RETRY_OPTIONS, type RetryOptions } from '../embedding/retry.js';
import { ConfigurationError, reportWarning } from '../errors.js';
import type { VectorStore } from '../store/types.js';
import { compareScored } from '../store/types.js';
import type { Chunk, ParentBlock } from '../types.js';

export interface RetrievalHit {
  chunk: Chunk;
  score: number;
  parent?: ParentBlock;
}

export interface RetrievalResult {
  query: string;
  modelId: string;
  hits: RetrievalHit[];
}

export interface RetrieverOptions {
  hierarchical?: boolean;
  storeRetry?: RetryOptions;
}

export class Retriever {
  private readonly hierarchical: boolean;
  private readonly storeRetry: RetryOptions;

  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorStore,
    options: RetrieverOptions = {},
  ) {
    this.hierarchical = options.hierarchical ?? false;
    this.storeRetry = options.storeRetry ?? DEFAULT_RETRY_OPTIONS;
  }

  async retrieve(query: string, topK: number): Promise<RetrievalResult> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ConfigurationError(`topK must be a positive integer, got ${topK}`);
    }
    const modelId = this.embedder.modelId;
    const empty: RetrievalResult = { query, modelId, hits: [] };

    const stored = await withRetry(() => this.store.getModelId(), {
      ...this.storeRetry,
      label: 'store.getModelId',
    });
    if (stored === null) {
      reportWarning({ kind: 'empty-index', message: 'Vector store is empty; nothing to retrieve' });
      return empty;
    }
    if (stored !== modelId) {
      throw new ConfigurationError(
        `Embedding model mismatch: index was built with "${stored}", query uses "${modelId}"`,
      );
    }
    if (query.trim() === '') {
      reportWarning({ kind: 'no-results', message: 'Empty query; returning no results' });
      return empty;
    }

    const [vector] = await this.embedder.embed([query]);
    if (!vector) throw new Error('Embedder returned no vector for the query');

    const scored = await withRetry(() => this.store.search(vector, topK), {
      ...this.storeRetry,
      label: 'store.search',
    });

    let parents = new Map<string, ParentBlock>();
    if (this.hierarchical) {
      const parentIds = [...new Set(scored.flatMap((s) => (s.record.chunk.parentId ? [s.record.chunk.parentId] : [])))];
      if (parentIds.length > 0) {
        parents = await withRetry(() => this.store.getParents(parentIds), {
          ...this.storeRetry,
          label: 'store.getParents',
        });
      }
    }

    const hits: RetrievalHit[] = [...scored]
      .sort(compareScored)
      .slice(0, topK)
      .map(({ record, score }) => {
        const parent = record.chunk.parentId ? parents.get(record.chunk.parentId) : undefined;
        return parent ? { chunk: record.chunk, score, parent } : { chunk: record.chunk, score };
      });

    if (hits.length === 0) {
      reportWarning({ kind: 'no-results', message: `No results for query "${query.slice(0, 80)}"` });
    }
    return { query, modelId, hits };
  }
}
