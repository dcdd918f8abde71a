/**
 * FILE PURPOSE: Wire the pipeline from one PipelineConfig
 *
 * WHY: The batch script, the queue worker and the chat agent all need the same
 *      embedder settings on both the indexing and the query side; building them
 *      in one place keeps the model id from drifting between the two.
 *
 * USAGE:
 *   const rag = createRagRuntime(loadPipelineConfig(), { store: new InMemoryVectorStore() });
 *   await indexTranscripts(transcripts, rag);
 *   const context = await rag.tool.run('what did they say about pricing?');
 */

import type { PipelineConfig } from './config.js';
import { validatePipelineConfig } from './config.js';
import { DEFAULT_BOILERPLATE_PHRASES } from './chunking/normalizer.js';
import { createChunkingPipeline, type ChunkingPipeline } from './chunking/pipeline.js';
import { createOpenAIEmbedder, type Embedder, type EmbeddingsClient } from './embedding/embedder.js';
import type { RetryOptions } from './embedding/retry.js';
import { Indexer } from './indexing/indexer.js';
import { Retriever } from './retrieval/retriever.js';
import { createRetrievalTool, type RetrievalTool } from './retrieval/tool.js';
import type { VectorStore } from './store/types.js';

export interface RagRuntimeOptions {
  store: VectorStore;
  /** Replaces the OpenAI-backed embedder built from config. */
  embedder?: Embedder;
  /** OpenAI-compatible client for the default embedder. */
  client?: EmbeddingsClient;
  fillers?: Iterable<string>;
  /** Defaults to DEFAULT_BOILERPLATE_PHRASES; pass [] to disable trimming. */
  boilerplatePhrases?: readonly string[];
}

export interface RagRuntime {
  config: PipelineConfig;
  store: VectorStore;
  embedder: Embedder;
  pipeline: ChunkingPipeline;
  indexer: Indexer;
  retriever: Retriever;
  tool: RetrievalTool;
}

export function retryOptionsFromConfig(config: PipelineConfig): RetryOptions {
  return {
    attempts: config.embeddingMaxAttempts,
    backoff: { type: 'exponential', delay: 1000 },
    timeoutMs: config.embeddingTimeoutMs,
  };
}

export function createRagRuntime(config: PipelineConfig, options: RagRuntimeOptions): RagRuntime {
  validatePipelineConfig(config);
  const retry = retryOptionsFromConfig(config);
  const embedder = options.embedder ?? createOpenAIEmbedder({
    modelId: config.embeddingModelId,
    client: options.client,
    batchSize: config.embeddingBatchSize,
    concurrency: config.embeddingConcurrency,
    retry,
  });
  const storeRetry: RetryOptions = { ...retry, timeoutMs: undefined };

  const pipeline = createChunkingPipeline(config, {
    embedder,
    fillers: options.fillers,
    boilerplatePhrases: options.boilerplatePhrases ?? DEFAULT_BOILERPLATE_PHRASES,
  });
  const indexer = new Indexer(embedder, options.store, { storeRetry });
  const retriever = new Retriever(embedder, options.store, {
    hierarchical: config.hierarchicalRetrieval,
    storeRetry,
  });
  const tool = createRetrievalTool(retriever, {
    topK: config.retrievalTopK,
    tokenBudget: config.contextTokenBudget,
  });

  return { config, store: options.store, embedder, pipeline, indexer, retriever, tool };
}
