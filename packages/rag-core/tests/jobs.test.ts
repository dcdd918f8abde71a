import { describe, it, expect, vi } from 'vitest';
import type { Queue } from 'bullmq';
import { deserializeTranscript, serializeTranscript, type IndexingJobData } from '../src/pipeline/jobs.js';
import { enqueueIndexTranscript, enqueueRemoveTranscript, JobType } from '../src/pipeline/queue.js';
import { parseTranscriptFile } from '../src/ingest/transcript-schema.js';
import { ConfigurationError } from '../src/errors.js';
import type { Transcript } from '../src/types.js';

const transcript: Transcript = {
  sourceId: 'vid1',
  text: 'Hello there.',
  createdAt: new Date('2024-05-01T12:00:00.000Z'),
  metadata: { title: 'Talk', topics: ['caching'] },
};

function fakeQueue() {
  const add = vi.fn().mockResolvedValue({ id: 'job-1' });
  const queue = { add } as unknown as Queue<IndexingJobData>;
  return { queue, add };
}

describe('transcript serialization', () => {
  it('carries dates as ISO strings and restores them', () => {
    const serialized = serializeTranscript(transcript);
    expect(serialized.createdAt).toBe('2024-05-01T12:00:00.000Z');
    expect(deserializeTranscript(JSON.parse(JSON.stringify(serialized)))).toEqual(transcript);
  });

  it('omits createdAt when absent', () => {
    expect(serializeTranscript({ sourceId: 'vid2', text: 'x', metadata: {} })).toEqual({
      sourceId: 'vid2',
      text: 'x',
      metadata: {},
    });
  });

  it('rejects malformed payloads with the offending path', () => {
    expect(() => deserializeTranscript({ sourceId: 'vid1' })).toThrow('Invalid transcript: text: Required');
  });
});

describe('parseTranscriptFile', () => {
  it('defaults metadata and keeps unknown metadata keys', () => {
    const [first, second] = parseTranscriptFile([
      { sourceId: 'a', text: 'one' },
      { sourceId: 'b', text: 'two', metadata: { title: 'B', language: 'en' } },
    ]);
    expect(first).toEqual({ sourceId: 'a', text: 'one', metadata: {} });
    expect(second?.metadata).toEqual({ title: 'B', language: 'en' });
  });

  it('reports the index of a bad entry', () => {
    expect(() => parseTranscriptFile([{ sourceId: '', text: 'x' }])).toThrow(
      'Invalid transcript file: 0.sourceId: String must contain at least 1 character(s)',
    );
    expect(() => parseTranscriptFile({})).toThrow(ConfigurationError);
  });
});

describe('enqueue helpers', () => {
  it('enqueues an index job with the serialized transcript', async () => {
    const { queue, add } = fakeQueue();

    expect(await enqueueIndexTranscript(queue, transcript)).toBe('job-1');
    expect(add).toHaveBeenCalledWith(JobType.INDEX_TRANSCRIPT, {
      type: JobType.INDEX_TRANSCRIPT,
      sourceId: 'vid1',
      transcript: serializeTranscript(transcript),
    });
  });

  it('enqueues a remove job', async () => {
    const { queue, add } = fakeQueue();

    await enqueueRemoveTranscript(queue, 'vid1');
    expect(add).toHaveBeenCalledWith(JobType.REMOVE_TRANSCRIPT, { type: JobType.REMOVE_TRANSCRIPT, sourceId: 'vid1' });
  });
});
