/**
 * FILE PURPOSE: Pipeline configuration: env parsing, defaults, fail-fast validation
 *
 * WHY: Malformed values must abort at pipeline construction, before any transcript
 *      is touched or any embedding call is paid for.
 * HOW: `loadPipelineConfig()` reads process.env (or a supplied env map), applies
 *      overrides, then `validatePipelineConfig()` throws ConfigurationError.
 */

import { ConfigurationError } from './errors.js';

export interface PipelineConfig {
  maxChunkSize: number;
  minChunkSize: number;
  chunkOverlap: number;
  retrievalTopK: number;
  similarityThreshold: number;
  semanticRefinement: boolean;
  hierarchicalRetrieval: boolean;
  parentMinSize: number;
  parentMaxSize: number;
  contextTokenBudget: number;
  embeddingModelId: string;
  embeddingBatchSize: number;
  embeddingConcurrency: number;
  embeddingTimeoutMs: number;
  embeddingMaxAttempts: number;
}

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = {
  maxChunkSize: 400,
  minChunkSize: 150,
  chunkOverlap: 50,
  retrievalTopK: 4,
  similarityThreshold: 0.65,
  semanticRefinement: false,
  hierarchicalRetrieval: false,
  parentMinSize: 1000,
  parentMaxSize: 2000,
  contextTokenBudget: 2000,
  embeddingModelId: 'text-embedding-3-small',
  embeddingBatchSize: 64,
  embeddingConcurrency: 4,
  embeddingTimeoutMs: 30_000,
  embeddingMaxAttempts: 3,
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${key} must be an integer, got "${raw}"`);
  }
  return parsed;
}

function readFloat(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return parsed;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  throw new ConfigurationError(`${key} must be a boolean, got "${raw}"`);
}

export function loadPipelineConfig(
  env: Env = process.env,
  overrides: Partial<PipelineConfig> = {},
): PipelineConfig {
  const d = DEFAULT_PIPELINE_CONFIG;
  const config: PipelineConfig = {
    maxChunkSize: readInt(env, 'MAX_CHUNK_SIZE', d.maxChunkSize),
    minChunkSize: readInt(env, 'MIN_CHUNK_SIZE', d.minChunkSize),
    chunkOverlap: readInt(env, 'CHUNK_OVERLAP', d.chunkOverlap),
    retrievalTopK: readInt(env, 'RETRIEVAL_TOP_K', d.retrievalTopK),
    similarityThreshold: readFloat(env, 'SIMILARITY_THRESHOLD', d.similarityThreshold),
    semanticRefinement: readBool(env, 'SEMANTIC_REFINEMENT', d.semanticRefinement),
    hierarchicalRetrieval: readBool(env, 'HIERARCHICAL_RETRIEVAL', d.hierarchicalRetrieval),
    parentMinSize: readInt(env, 'PARENT_MIN_SIZE', d.parentMinSize),
    parentMaxSize: readInt(env, 'PARENT_MAX_SIZE', d.parentMaxSize),
    contextTokenBudget: readInt(env, 'CONTEXT_TOKEN_BUDGET', d.contextTokenBudget),
    embeddingModelId: env.EMBEDDING_MODEL_ID?.trim() || d.embeddingModelId,
    embeddingBatchSize: readInt(env, 'EMBEDDING_BATCH_SIZE', d.embeddingBatchSize),
    embeddingConcurrency: readInt(env, 'EMBEDDING_CONCURRENCY', d.embeddingConcurrency),
    embeddingTimeoutMs: readInt(env, 'EMBEDDING_TIMEOUT_MS', d.embeddingTimeoutMs),
    embeddingMaxAttempts: readInt(env, 'EMBEDDING_MAX_ATTEMPTS', d.embeddingMaxAttempts),
    ...overrides,
  };
  return validatePipelineConfig(config);
}

/** Throws ConfigurationError on the first invalid value; returns the config unchanged. */
export function validatePipelineConfig(config: PipelineConfig): PipelineConfig {
  const positive: (keyof PipelineConfig)[] = [
    'maxChunkSize',
    'minChunkSize',
    'retrievalTopK',
    'parentMinSize',
    'parentMaxSize',
    'embeddingBatchSize',
    'embeddingConcurrency',
    'embeddingTimeoutMs',
    'embeddingMaxAttempts',
  ];
  for (const key of positive) {
    const value = config[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      throw new ConfigurationError(`${key} must be a positive integer, got ${String(value)}`);
    }
  }

  if (config.minChunkSize > config.maxChunkSize) {
    throw new ConfigurationError(
      `minChunkSize (${config.minChunkSize}) must not exceed maxChunkSize (${config.maxChunkSize})`,
    );
  }
  if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
    throw new ConfigurationError(`chunkOverlap must be a non-negative integer, got ${config.chunkOverlap}`);
  }
  if (config.chunkOverlap >= config.maxChunkSize) {
    throw new ConfigurationError(
      `chunkOverlap (${config.chunkOverlap}) must be smaller than maxChunkSize (${config.maxChunkSize})`,
    );
  }
  if (config.similarityThreshold < -1 || config.similarityThreshold > 1) {
    throw new ConfigurationError(`similarityThreshold must be within [-1, 1], got ${config.similarityThreshold}`);
  }
  if (config.parentMinSize > config.parentMaxSize) {
    throw new ConfigurationError(
      `parentMinSize (${config.parentMinSize}) must not exceed parentMaxSize (${config.parentMaxSize})`,
    );
  }
  if (config.parentMaxSize < config.maxChunkSize) {
    throw new ConfigurationError(
      `parentMaxSize (${config.parentMaxSize}) must be at least maxChunkSize (${config.maxChunkSize})`,
    );
  }
  if (!Number.isInteger(config.contextTokenBudget) || config.contextTokenBudget < 0) {
    throw new ConfigurationError(`contextTokenBudget must be a non-negative integer, got ${config.contextTokenBudget}`);
  }
  if (config.embeddingModelId.trim() === '') {
    throw new ConfigurationError('embeddingModelId must not be empty');
  }
  return config;
}
