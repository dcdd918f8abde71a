/**
 * Shared test fixtures: synthetic transcripts and an in-process embedder.
 */

import { vi } from 'vitest';
import type { Embedder } from '../src/embedding/embedder.js';
import type { RetryOptions } from '../src/embedding/retry.js';
import type { Chunk, EmbeddingRecord } from '../src/types.js';

/** `count` sentences of `words` tokens each: "w w … end." */
export function paragraph(count: number, words = 10): string {
  const sentence = [...Array<string>(words - 1).fill('w'), 'end.'].join(' ');
  return Array<string>(count).fill(sentence).join(' ');
}

/** 1,000 tokens: two 500-token paragraphs of 10-token sentences. */
export const TWO_PARAGRAPHS = `${paragraph(50)}\n\n${paragraph(50)}`;

/**
 * Embeds by keyword: texts mentioning "cache" point one way, everything else
 * the other. Deterministic and offline.
 */
export function keywordEmbedder(modelId = 'test-embed') {
  const embed = vi.fn(async (texts: string[]): Promise<number[][]> =>
    texts.map((t) => (t.toLowerCase().includes('cache') ? [1, 0] : [0, 1])),
  );
  const embedder: Embedder = { modelId, embed };
  return { embedder, embed };
}

export function silenceStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

/** A chunk with no overlap whose span is `[start, start + text.length)`. */
export function makeChunk(sourceId: string, ordinal: number, text: string, extra: Partial<Chunk> = {}): Chunk {
  const start = extra.start ?? 0;
  return {
    id: `${sourceId}:${ordinal}`,
    sourceId,
    ordinal,
    text,
    tokenCount: text.split(/\s+/).filter(Boolean).length,
    overlapTokenCount: 0,
    start,
    end: start + text.length,
    overlapStart: start,
    metadata: {},
    ...extra,
  };
}

export function makeRecord(chunk: Chunk, vector: number[], modelId = 'test-embed'): EmbeddingRecord {
  return { chunkId: chunk.id, sourceId: chunk.sourceId, vector, modelId, chunk };
}

/** Store retries without real waits. */
export const FAST_RETRY: RetryOptions = { attempts: 2, backoff: { type: 'fixed', delay: 1 } };
