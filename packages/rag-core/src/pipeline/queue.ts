/**
 * FILE PURPOSE: BullMQ queue factory for transcript indexing
 * WHY: Indexing a long transcript takes many embedding round-trips; ingestion
 *      enqueues and returns, the worker process does the work with retries.
 */

import { Queue } from 'bullmq';
import type { DefaultJobOptions } from 'bullmq';
import type { Transcript } from '../types.js';
import { parseRedisConnection } from './connection.js';
import { serializeTranscript, type IndexingJobData } from './jobs.js';

export const JobType = {
  INDEX_TRANSCRIPT: 'index-transcript',
  REMOVE_TRANSCRIPT: 'remove-transcript',
} as const;

export type JobTypeValue = (typeof JobType)[keyof typeof JobType];

export const QUEUE_NAME = 'transcript-indexing';

export const DEFAULT_JOB_OPTIONS: DefaultJobOptions = {
  attempts: 3,
  backoff: { type: 'exponential', delay: 1000 },
  removeOnComplete: { count: 1000 },
  removeOnFail: { count: 5000 },
};

export function createIndexingQueue(redisUrl?: string): Queue<IndexingJobData> {
  return new Queue<IndexingJobData>(QUEUE_NAME, {
    connection: parseRedisConnection(redisUrl),
    defaultJobOptions: DEFAULT_JOB_OPTIONS,
  });
}

export async function enqueueIndexTranscript(
  queue: Queue<IndexingJobData>,
  transcript: Transcript,
): Promise<string | undefined> {
  const job = await queue.add(JobType.INDEX_TRANSCRIPT, {
    type: JobType.INDEX_TRANSCRIPT,
    sourceId: transcript.sourceId,
    transcript: serializeTranscript(transcript),
  });
  return job.id;
}

export async function enqueueRemoveTranscript(
  queue: Queue<IndexingJobData>,
  sourceId: string,
): Promise<string | undefined> {
  const job = await queue.add(JobType.REMOVE_TRANSCRIPT, { type: JobType.REMOVE_TRANSCRIPT, sourceId });
  return job.id;
}
