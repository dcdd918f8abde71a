/**
 * FILE PURPOSE: One embedding record per chunk, atomic per-transcript replace
 *
 * WHY: Re-chunking a transcript changes its chunk set; stale vectors from the old
 *      set must not outlive the swap. Replacing by source-id prefix in a single
 *      store write leaves exactly one live record per current chunk id.
 * HOW: Embed everything first (the slow, failure-prone part), then hand the
 *      complete set to `store.replaceSource()`. A store whose recorded model
 *      differs from the embedder's is refused before any embedding call.
 */

import type { Embedder } from '../embedding/embedder.js';
import { withRetry, DEFAULT_RETRY_OPTIONS, type RetryOptions } from '../embedding/retry.js';
import { ConfigurationError } from '../errors.js';
import type { VectorStore } from '../store/types.js';
import type { Chunk, EmbeddingRecord, ParentBlock } from '../types.js';
import { sourcePrefix } from '../types.js';

export interface IndexerOptions {
  /** Retry policy for store writes; embedding retries are the embedder's. */
  storeRetry?: RetryOptions;
}

export interface IndexReport {
  sourceId: string;
  chunkCount: number;
  parentCount: number;
  modelId: string;
}

export class Indexer {
  private readonly storeRetry: RetryOptions;

  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorStore,
    options: IndexerOptions = {},
  ) {
    this.storeRetry = options.storeRetry ?? DEFAULT_RETRY_OPTIONS;
  }

  get modelId(): string {
    return this.embedder.modelId;
  }

  /** Throws ConfigurationError when the store was built with another model. */
  async assertCompatible(): Promise<void> {
    const stored = await withRetry(() => this.store.getModelId(), {
      ...this.storeRetry,
      label: 'store.getModelId',
    });
    if (stored !== null && stored !== this.embedder.modelId) {
      throw new ConfigurationError(
        `Embedding model mismatch: index was built with "${stored}", embedder uses "${this.embedder.modelId}"`,
      );
    }
  }

  private async embedChunks(chunks: Chunk[]): Promise<EmbeddingRecord[]> {
    if (chunks.length === 0) return [];
    const vectors = await this.embedder.embed(chunks.map((c) => c.text));
    if (vectors.length !== chunks.length) {
      throw new Error(`Embedder returned ${vectors.length} vectors for ${chunks.length} chunks`);
    }
    const dimensions = vectors[0]?.length ?? 0;
    return chunks.map((chunk, i) => {
      const vector = vectors[i] ?? [];
      if (vector.length === 0 || vector.length !== dimensions) {
        throw new Error(`Embedding for ${chunk.id} has ${vector.length} dimensions, expected ${dimensions}`);
      }
      return { chunkId: chunk.id, sourceId: chunk.sourceId, vector, modelId: this.embedder.modelId, chunk };
    });
  }

  /** Embed a single chunk; the record is returned, not stored. */
  async index(chunk: Chunk): Promise<EmbeddingRecord> {
    const [record] = await this.embedChunks([chunk]);
    if (!record) throw new Error(`No embedding produced for ${chunk.id}`);
    return record;
  }

  /** Embed and upsert a set of chunks (and their parents); returns the store. */
  async build(chunks: Chunk[], parents: ParentBlock[] = []): Promise<VectorStore> {
    await this.assertCompatible();
    const records = await this.embedChunks(chunks);
    await withRetry(() => this.store.upsert(this.embedder.modelId, records, parents), {
      ...this.storeRetry,
      label: 'store.upsert',
    });
    return this.store;
  }

  /** Replace everything indexed for the transcript with its current chunk set. */
  async reindexTranscript(sourceId: string, chunks: Chunk[], parents: ParentBlock[] = []): Promise<IndexReport> {
    const foreign = chunks.find((c) => c.sourceId !== sourceId) ?? parents.find((p) => p.sourceId !== sourceId);
    if (foreign) {
      throw new ConfigurationError(`${foreign.id} does not belong to transcript ${sourceId}`);
    }
    await this.assertCompatible();
    const records = await this.embedChunks(chunks);
    await withRetry(() => this.store.replaceSource(sourceId, this.embedder.modelId, records, parents), {
      ...this.storeRetry,
      label: `store.replaceSource(${sourceId})`,
    });
    return { sourceId, chunkCount: records.length, parentCount: parents.length, modelId: this.embedder.modelId };
  }

  async removeTranscript(sourceId: string): Promise<number> {
    return withRetry(() => this.store.deleteByPrefix(sourcePrefix(sourceId)), {
      ...this.storeRetry,
      label: `store.deleteByPrefix(${sourceId})`,
    });
  }
}
