/**
 * FILE PURPOSE: Embedding function abstraction + OpenAI/LiteLLM implementation
 *
 * WHY: Index time and query time must use the same model. The `modelId` travels
 *      with every embedder so the store can record it and the retriever can
 *      refuse a mismatch before paying for a query embedding.
 * HOW: Inputs are cut into batches, each embedded under `withRetry` through one
 *      limiter per embedder, so `concurrency` bounds in-flight requests across
 *      every concurrent `embed()` call. Output order matches input order.
 */

import { createLLMClient } from './llm-client.js';
import { createLimiter } from './concurrency.js';
import { withRetry, DEFAULT_RETRY_OPTIONS, type RetryOptions } from './retry.js';

export interface Embedder {
  readonly modelId: string;
  embed(texts: string[]): Promise<number[][]>;
}

/** The slice of the OpenAI SDK the embedder needs; test doubles implement only this. */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string[] },
      options?: { signal?: AbortSignal },
    ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAIEmbedderOptions {
  modelId: string;
  client?: EmbeddingsClient;
  batchSize?: number;
  /** Most embedding requests in flight at once, shared by all callers of this embedder. */
  concurrency?: number;
  retry?: RetryOptions;
}

export function chunkArray<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export function createOpenAIEmbedder(options: OpenAIEmbedderOptions): Embedder {
  const {
    modelId,
    batchSize = 64,
    concurrency = 4,
    retry = DEFAULT_RETRY_OPTIONS,
  } = options;
  const client: EmbeddingsClient = options.client ?? createLLMClient({ timeoutMs: retry.timeoutMs });
  const limit = createLimiter(concurrency);

  const embedBatch = async (batch: string[]): Promise<number[][]> => {
    const response = await withRetry(
      (signal) => client.embeddings.create({ model: modelId, input: batch }, { signal }),
      { ...retry, label: retry.label ?? `embed(${modelId})` },
    );
    if (response.data.length !== batch.length) {
      throw new Error(`Embedding response returned ${response.data.length} vectors for ${batch.length} inputs`);
    }
    return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  };

  return {
    modelId,
    async embed(texts: string[]): Promise<number[][]> {
      if (texts.length === 0) return [];
      const batches = chunkArray(texts, batchSize);
      const results = await Promise.all(batches.map((batch) => limit(() => embedBatch(batch))));
      return results.flat();
    },
  };
}
