import { describe, it, expect } from 'vitest';
import { DEFAULT_PIPELINE_CONFIG, loadPipelineConfig, validatePipelineConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

describe('loadPipelineConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadPipelineConfig({})).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it('reads values from the environment', () => {
    const config = loadPipelineConfig({
      MAX_CHUNK_SIZE: '500',
      SEMANTIC_REFINEMENT: 'yes',
      SIMILARITY_THRESHOLD: '0.7',
      EMBEDDING_MODEL_ID: ' custom-embed ',
    });
    expect(config.maxChunkSize).toBe(500);
    expect(config.semanticRefinement).toBe(true);
    expect(config.similarityThreshold).toBe(0.7);
    expect(config.embeddingModelId).toBe('custom-embed');
  });

  it('applies overrides after the environment', () => {
    expect(loadPipelineConfig({ RETRIEVAL_TOP_K: '8' }, { retrievalTopK: 2 }).retrievalTopK).toBe(2);
  });

  it('rejects malformed values', () => {
    expect(() => loadPipelineConfig({ MAX_CHUNK_SIZE: 'big' })).toThrow('MAX_CHUNK_SIZE must be an integer, got "big"');
    expect(() => loadPipelineConfig({ HIERARCHICAL_RETRIEVAL: 'maybe' })).toThrow(ConfigurationError);
  });
});

describe('validatePipelineConfig', () => {
  const base = { ...DEFAULT_PIPELINE_CONFIG };

  it('rejects inconsistent bounds', () => {
    expect(() => validatePipelineConfig({ ...base, chunkOverlap: 400 })).toThrow(ConfigurationError);
    expect(() => validatePipelineConfig({ ...base, maxChunkSize: 0 })).toThrow(
      'maxChunkSize must be a positive integer, got 0',
    );
    expect(() => validatePipelineConfig({ ...base, parentMaxSize: 300, parentMinSize: 100 })).toThrow(
      'parentMaxSize (300) must be at least maxChunkSize (400)',
    );
    expect(() => validatePipelineConfig({ ...base, similarityThreshold: 1.5 })).toThrow(ConfigurationError);
  });

  it('accepts zero overlap and a zero context budget', () => {
    expect(() => validatePipelineConfig({ ...base, chunkOverlap: 0, contextTokenBudget: 0 })).not.toThrow();
  });
});
