/**
 * FILE PURPOSE: BullMQ processor dispatch and worker factory for transcript indexing
 * WHY: Processors return results so the worker entry point can log them.
 *      A ConfigurationError will fail identically on every retry, so it is
 *      rethrown as UnrecoverableError and the job fails at once.
 */

import { UnrecoverableError, Worker } from 'bullmq';
import type { Job } from 'bullmq';
import { ConfigurationError } from '../errors.js';
import type { IndexingJobData } from './jobs.js';
import { JobType, QUEUE_NAME } from './queue.js';
import { parseRedisConnection } from './connection.js';
import {
  processIndexTranscript,
  processRemoveTranscript,
  type IndexingDeps,
  type IndexTranscriptResult,
  type RemoveTranscriptResult,
} from './processors/index.js';

export type IndexingJobResult = IndexTranscriptResult | RemoveTranscriptResult;

export type IndexingProcessor = (job: Job<IndexingJobData>) => Promise<IndexingJobResult>;

export function createIndexingProcessor(deps: IndexingDeps): IndexingProcessor {
  const dispatch = async (job: Job<IndexingJobData>): Promise<IndexingJobResult> => {
    const data = job.data;
    const type: string = data.type;
    switch (data.type) {
      case JobType.INDEX_TRANSCRIPT:
        return processIndexTranscript(job, data, deps);
      case JobType.REMOVE_TRANSCRIPT:
        return processRemoveTranscript(job, data, deps);
      default:
        throw new UnrecoverableError(`Unknown job type: ${type}`);
    }
  };

  return async (job) => {
    try {
      return await dispatch(job);
    } catch (err) {
      if (err instanceof ConfigurationError) {
        throw new UnrecoverableError(`${err.name}: ${err.message}`);
      }
      throw err;
    }
  };
}

export function createIndexingWorker(
  deps: IndexingDeps,
  redisUrl?: string,
  concurrency = 2,
): Worker<IndexingJobData, IndexingJobResult> {
  return new Worker<IndexingJobData, IndexingJobResult>(
    QUEUE_NAME,
    createIndexingProcessor(deps),
    {
      connection: parseRedisConnection(redisUrl),
      concurrency,
    },
  );
}
