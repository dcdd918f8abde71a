/**
 * FILE PURPOSE: INDEX_TRANSCRIPT processor: chunk, embed, swap the source's records
 * WHY: Idempotent: re-running it for the same transcript leaves the same chunk
 *      set, so BullMQ retries are safe.
 */

import type { Job } from 'bullmq';
import type { ChunkingPipeline } from '../../chunking/pipeline.js';
import type { Indexer } from '../../indexing/indexer.js';
import { deserializeTranscript, type IndexTranscriptJobData } from '../jobs.js';

export interface IndexingDeps {
  pipeline: ChunkingPipeline;
  indexer: Indexer;
}

export interface IndexTranscriptResult {
  sourceId: string;
  chunkCount: number;
  parentCount: number;
  modelId: string;
}

export async function processIndexTranscript(
  job: Pick<Job, 'log'>,
  data: IndexTranscriptJobData,
  deps: IndexingDeps,
): Promise<IndexTranscriptResult> {
  const transcript = deserializeTranscript(data.transcript);
  if (transcript.sourceId !== data.sourceId) {
    throw new Error(`Job sourceId ${data.sourceId} does not match transcript ${transcript.sourceId}`);
  }

  const chunked = await deps.pipeline.chunk(transcript);
  if (chunked.chunks.length === 0) {
    await job.log(`Transcript ${data.sourceId} is empty after normalization; removing its records`);
  }

  const report = await deps.indexer.reindexTranscript(data.sourceId, chunked.chunks, chunked.parents);
  await job.log(`Indexed ${data.sourceId}: ${report.chunkCount} chunks, ${report.parentCount} parents (${report.modelId})`);
  return report;
}
