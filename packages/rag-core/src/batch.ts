/**
 * FILE PURPOSE: Index many transcripts with bounded parallelism
 *
 * WHY: One bad transcript (API outage outlasting retries, malformed id) must not
 *      sink the batch. Failures are isolated and reported per source.
 * HOW: A model mismatch is checked once up front and aborts everything; after
 *      that each transcript runs chunk → reindex on its own and lands in exactly
 *      one of indexed / skipped / failed.
 */

import type { ChunkingPipeline } from './chunking/pipeline.js';
import { mapWithConcurrency } from './embedding/concurrency.js';
import type { Indexer } from './indexing/indexer.js';
import type { Transcript } from './types.js';

export interface BatchIndexOptions {
  pipeline: ChunkingPipeline;
  indexer: Indexer;
  /** Transcripts processed at once. Default 2. */
  concurrency?: number;
}

export interface BatchIndexReport {
  indexed: Array<{ sourceId: string; chunkCount: number }>;
  /** Sources that normalized to nothing; any previous records were removed. */
  skipped: string[];
  failed: Array<{ sourceId: string; error: string }>;
}

type Outcome =
  | { status: 'indexed'; sourceId: string; chunkCount: number }
  | { status: 'skipped'; sourceId: string }
  | { status: 'failed'; sourceId: string; error: string };

export async function indexTranscripts(
  transcripts: readonly Transcript[],
  options: BatchIndexOptions,
): Promise<BatchIndexReport> {
  const { pipeline, indexer, concurrency = 2 } = options;
  await indexer.assertCompatible();

  const outcomes = await mapWithConcurrency(transcripts, concurrency, async (transcript): Promise<Outcome> => {
    const { sourceId } = transcript;
    try {
      const chunked = await pipeline.chunk(transcript);
      await indexer.reindexTranscript(sourceId, chunked.chunks, chunked.parents);
      if (chunked.chunks.length === 0) return { status: 'skipped', sourceId };
      process.stderr.write(`INFO: Indexed ${sourceId} (${chunked.chunks.length} chunks)\n`);
      return { status: 'indexed', sourceId, chunkCount: chunked.chunks.length };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      process.stderr.write(`ERROR: Indexing ${sourceId} failed: ${error}\n`);
      return { status: 'failed', sourceId, error };
    }
  });

  const report: BatchIndexReport = { indexed: [], skipped: [], failed: [] };
  for (const outcome of outcomes) {
    if (outcome.status === 'indexed') {
      report.indexed.push({ sourceId: outcome.sourceId, chunkCount: outcome.chunkCount });
    } else if (outcome.status === 'skipped') {
      report.skipped.push(outcome.sourceId);
    } else {
      report.failed.push({ sourceId: outcome.sourceId, error: outcome.error });
    }
  }
  return report;
}
