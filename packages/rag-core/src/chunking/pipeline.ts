/**
 * FILE PURPOSE: Chunking pipeline — normalize → split → refine → stitch for one transcript
 *
 * WHY: Stages within a transcript are strictly sequential; transcripts share no
 *      mutable state, so callers may run many pipelines in parallel.
 * HOW: `createChunkingPipeline()` validates config up front (ConfigurationError)
 *      and returns a reusable `chunk()` function.
 */

import type { PipelineConfig } from '../config.js';
import { validatePipelineConfig } from '../config.js';
import { ConfigurationError, reportWarning } from '../errors.js';
import type { ChunkedTranscript, Transcript } from '../types.js';
import { createNormalizer } from './normalizer.js';
import { splitText } from './splitter.js';
import { EmbeddingRefiner, PassThroughRefiner, type ChunkRefiner } from './refiner.js';
import type { Embedder } from '../embedding/embedder.js';
import { stitch } from './stitcher.js';

export interface ChunkingPipelineOptions {
  /** Overrides the refiner chosen from `config.semanticRefinement`. */
  refiner?: ChunkRefiner;
  /** Required when semantic refinement is on and no refiner is given. */
  embedder?: Embedder;
  fillers?: Iterable<string>;
  boilerplatePhrases?: readonly string[];
  boilerplateWindowTokens?: number;
}

export interface ChunkingPipeline {
  readonly config: PipelineConfig;
  chunk(transcript: Transcript): Promise<ChunkedTranscript>;
}

export function assertValidSourceId(sourceId: string): void {
  if (sourceId.trim() === '') {
    throw new ConfigurationError('Transcript sourceId must not be empty');
  }
  // ':' separates the source id from the ordinal in chunk ids
  if (sourceId.includes(':')) {
    throw new ConfigurationError(`Transcript sourceId must not contain ':' (got "${sourceId}")`);
  }
}

function selectRefiner(config: PipelineConfig, options: ChunkingPipelineOptions): ChunkRefiner {
  if (options.refiner) return options.refiner;
  if (!config.semanticRefinement) return new PassThroughRefiner();
  if (!options.embedder) {
    throw new ConfigurationError('Semantic refinement is enabled but no embedder was provided');
  }
  return new EmbeddingRefiner(options.embedder, {
    similarityThreshold: config.similarityThreshold,
    maxChunkSize: config.maxChunkSize,
    minChunkSize: config.minChunkSize,
  });
}

export function createChunkingPipeline(
  config: PipelineConfig,
  options: ChunkingPipelineOptions = {},
): ChunkingPipeline {
  validatePipelineConfig(config);
  const normalizeText = createNormalizer({
    fillers: options.fillers,
    boilerplatePhrases: options.boilerplatePhrases,
    boilerplateWindowTokens: options.boilerplateWindowTokens,
  });
  const refiner = selectRefiner(config, options);

  return {
    config,
    async chunk(transcript: Transcript): Promise<ChunkedTranscript> {
      assertValidSourceId(transcript.sourceId);
      const normalizedText = normalizeText(transcript.text);

      if (normalizedText.length === 0) {
        reportWarning({
          kind: 'empty-transcript',
          sourceId: transcript.sourceId,
          message: `Transcript ${transcript.sourceId} is empty after normalization`,
        });
        return { sourceId: transcript.sourceId, normalizedText, chunks: [], parents: [] };
      }

      const raw = splitText(normalizedText, {
        maxChunkSize: config.maxChunkSize,
        minChunkSize: config.minChunkSize,
      });
      const refined = await refiner.refine(raw, normalizedText);
      const { chunks, parents } = stitch(refined, {
        sourceId: transcript.sourceId,
        text: normalizedText,
        overlapSize: config.chunkOverlap,
        metadata: transcript.metadata,
        hierarchy: config.hierarchicalRetrieval
          ? { parentMinSize: config.parentMinSize, parentMaxSize: config.parentMaxSize }
          : undefined,
      });

      return { sourceId: transcript.sourceId, normalizedText, chunks, parents };
    },
  };
}
