/**
 * FILE PURPOSE: Barrel export for the transcript chunking and retrieval core
 *
 * WHY: Single import point for the worker, scripts and the chat agent.
 *      Import: `import { createRagRuntime, indexTranscripts } from '@transcript-rag/core'`
 */

export { createRagRuntime, retryOptionsFromConfig } from './runtime.js';
export type { RagRuntime, RagRuntimeOptions } from './runtime.js';

export { loadPipelineConfig, validatePipelineConfig, DEFAULT_PIPELINE_CONFIG } from './config.js';
export type { PipelineConfig } from './config.js';

export {
  RagError,
  ConfigurationError,
  TransientIOError,
  AttemptTimeoutError,
  reportWarning,
  isTransientError,
} from './errors.js';
export type { RagErrorCode, EmptyInputWarning } from './errors.js';

export { chunkId, parentId, sourcePrefix, ownText } from './types.js';
export type {
  ChunkMetadata,
  Transcript,
  RawChunk,
  Chunk,
  ParentBlock,
  ChunkedTranscript,
  EmbeddingRecord,
} from './types.js';

export {
  parseTranscriptFile,
  parseTranscriptInput,
  toTranscript,
  transcriptInputSchema,
  transcriptFileSchema,
} from './ingest/transcript-schema.js';
export type { TranscriptInput } from './ingest/transcript-schema.js';

export { tokenize, countTokens } from './tokenizer.js';
export type { Token } from './tokenizer.js';
export { cosineSimilarity } from './similarity.js';

// ─── Chunking ───────────────────────────────────────────────────────────────
export { createNormalizer, normalize, DEFAULT_BOILERPLATE_PHRASES } from './chunking/normalizer.js';
export type { Normalizer, NormalizerOptions } from './chunking/normalizer.js';
export { splitText, DelimiterLevel } from './chunking/splitter.js';
export type { SplitOptions } from './chunking/splitter.js';
export { PassThroughRefiner, EmbeddingRefiner } from './chunking/refiner.js';
export type { ChunkRefiner, EmbeddingRefinerOptions } from './chunking/refiner.js';
export { stitch } from './chunking/stitcher.js';
export type { StitchOptions, StitchResult, HierarchyOptions } from './chunking/stitcher.js';
export { createChunkingPipeline, assertValidSourceId } from './chunking/pipeline.js';
export type { ChunkingPipeline, ChunkingPipelineOptions } from './chunking/pipeline.js';
export { parseFillerList, loadFillerList, formatFillerList } from './chunking/fillers.js';
export {
  generateStopwords,
  countTerms,
  DEFAULT_SPOKEN_FILLERS,
  DEFAULT_CONTENT_WORDS,
} from './chunking/stopword-generator.js';
export type { StopwordOptions, StopwordReport } from './chunking/stopword-generator.js';

// ─── Embedding ──────────────────────────────────────────────────────────────
export { createLLMClient } from './embedding/llm-client.js';
export type { OpenAI, LLMClientOptions } from './embedding/llm-client.js';
export { createOpenAIEmbedder } from './embedding/embedder.js';
export type { Embedder, EmbeddingsClient, OpenAIEmbedderOptions } from './embedding/embedder.js';
export { withRetry, backoffDelay, DEFAULT_RETRY_OPTIONS } from './embedding/retry.js';
export type { RetryOptions, BackoffOptions } from './embedding/retry.js';
export { mapWithConcurrency, createLimiter } from './embedding/concurrency.js';
export type { Limiter } from './embedding/concurrency.js';

// ─── Storage & indexing ─────────────────────────────────────────────────────
export { InMemoryVectorStore } from './store/memory-store.js';
export { compareScored, compareRanked } from './store/types.js';
export type { VectorStore, VectorStoreStats, SourceStats, ScoredRecord } from './store/types.js';
export { Indexer } from './indexing/indexer.js';
export type { IndexerOptions, IndexReport } from './indexing/indexer.js';
export { indexTranscripts } from './batch.js';
export type { BatchIndexOptions, BatchIndexReport } from './batch.js';

// ─── Retrieval ──────────────────────────────────────────────────────────────
export { Retriever } from './retrieval/retriever.js';
export type { RetrievalHit, RetrievalResult, RetrieverOptions } from './retrieval/retriever.js';
export { assembleContext } from './retrieval/assembler.js';
export type { ContextSegment, ContextWindow } from './retrieval/assembler.js';
export { createRetrievalTool } from './retrieval/tool.js';
export type { RetrievalTool, RetrievalToolOptions } from './retrieval/tool.js';

// ─── Indexing queue (BullMQ) ────────────────────────────────────────────────
export {
  createIndexingQueue,
  enqueueIndexTranscript,
  enqueueRemoveTranscript,
  JobType,
  QUEUE_NAME,
} from './pipeline/queue.js';
export type { JobTypeValue } from './pipeline/queue.js';
export { serializeTranscript, deserializeTranscript } from './pipeline/jobs.js';
export type {
  IndexingJobData,
  IndexTranscriptJobData,
  RemoveTranscriptJobData,
  SerializedTranscript,
} from './pipeline/jobs.js';
export { createIndexingProcessor, createIndexingWorker } from './pipeline/workers.js';
export type { IndexingJobResult, IndexingProcessor } from './pipeline/workers.js';
export { parseRedisConnection } from './pipeline/connection.js';
export type { IndexingDeps } from './pipeline/processors/index.js';
