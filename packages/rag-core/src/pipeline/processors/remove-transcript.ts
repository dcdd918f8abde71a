/**
 * FILE PURPOSE: REMOVE_TRANSCRIPT processor: delete a transcript's chunks and parents
 */

import type { Job } from 'bullmq';
import type { RemoveTranscriptJobData } from '../jobs.js';
import type { IndexingDeps } from './index-transcript.js';

export interface RemoveTranscriptResult {
  sourceId: string;
  removed: number;
}

export async function processRemoveTranscript(
  job: Pick<Job, 'log'>,
  data: RemoveTranscriptJobData,
  deps: Pick<IndexingDeps, 'indexer'>,
): Promise<RemoveTranscriptResult> {
  const removed = await deps.indexer.removeTranscript(data.sourceId);
  await job.log(`Removed ${removed} chunks of ${data.sourceId}`);
  return { sourceId: data.sourceId, removed };
}
