/**
 * FILE PURPOSE: Job payloads for the transcript indexing queue
 * WHY: Job data crosses Redis as JSON, so dates travel as ISO strings. The
 *      discriminated union gives each processor its payload type; the
 *      transcript itself is re-validated on the way out.
 */

import { parseTranscriptInput } from '../ingest/transcript-schema.js';
import type { ChunkMetadata, Transcript } from '../types.js';
import type { JobType } from './queue.js';

export interface SerializedTranscript {
  sourceId: string;
  text: string;
  createdAt?: string;
  metadata: ChunkMetadata;
}

/** (Re-)index one transcript: chunk, embed, swap its records in the store. */
export interface IndexTranscriptJobData {
  type: typeof JobType.INDEX_TRANSCRIPT;
  sourceId: string;
  transcript: SerializedTranscript;
}

/** Drop every chunk and parent block of a transcript. */
export interface RemoveTranscriptJobData {
  type: typeof JobType.REMOVE_TRANSCRIPT;
  sourceId: string;
}

export type IndexingJobData = IndexTranscriptJobData | RemoveTranscriptJobData;

export function serializeTranscript(transcript: Transcript): SerializedTranscript {
  const { sourceId, text, createdAt, metadata } = transcript;
  return createdAt
    ? { sourceId, text, createdAt: createdAt.toISOString(), metadata }
    : { sourceId, text, metadata };
}

/** Payloads come back from Redis as untyped JSON; ConfigurationError when malformed. */
export function deserializeTranscript(data: unknown): Transcript {
  return parseTranscriptInput(data);
}
