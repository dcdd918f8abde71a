/**
 * FILE PURPOSE: Optional semantic refinement — move chunk boundaries onto topic shifts
 *
 * WHY: Size-driven cuts ignore meaning. Where adjacent sentences diverge in
 *      embedding space the transcript has usually changed topic, and a boundary
 *      there retrieves better than one mid-topic.
 * HOW: Strategy interface. PassThroughRefiner skips the stage; EmbeddingRefiner
 *      embeds sentence units, cuts where cosine similarity falls below the
 *      threshold, then folds pieces under min back into a neighbour when that
 *      stays within max. Pieces are contiguous token ranges, so coverage of the
 *      normalized text is exact.
 */

import type { RawChunk } from '../types.js';
import type { Embedder } from '../embedding/embedder.js';
import { cosineSimilarity } from '../similarity.js';
import { tokenize, type Token } from '../tokenizer.js';
import { DelimiterLevel, gapLevel, toRawChunk } from './splitter.js';

export interface ChunkRefiner {
  refine(chunks: RawChunk[], text: string): Promise<RawChunk[]>;
}

export class PassThroughRefiner implements ChunkRefiner {
  async refine(chunks: RawChunk[]): Promise<RawChunk[]> {
    return chunks;
  }
}

export interface EmbeddingRefinerOptions {
  similarityThreshold: number;
  maxChunkSize: number;
  minChunkSize: number;
}

export interface Piece {
  tokenStart: number;
  tokenEnd: number;
  /** True when the join with the previous piece is a detected topic shift. */
  topicBefore: boolean;
}

const size = (p: Piece): number => p.tokenEnd - p.tokenStart;

/** Sentence-or-stronger units inside [tokenStart, tokenEnd). */
export function sentenceUnits(
  text: string,
  tokens: Token[],
  tokenStart: number,
  tokenEnd: number,
): Array<[number, number]> {
  const units: Array<[number, number]> = [];
  let unitStart = tokenStart;
  for (let k = tokenStart + 1; k < tokenEnd; k++) {
    if (gapLevel(text, tokens, k) <= DelimiterLevel.SENTENCE) {
      units.push([unitStart, k]);
      unitStart = k;
    }
  }
  if (tokenEnd > unitStart) units.push([unitStart, tokenEnd]);
  return units;
}

/**
 * Fold pieces under `minChunkSize` into a neighbour when the result fits in
 * `maxChunkSize`. A non-topic join is preferred; otherwise the smaller result,
 * then the previous piece. The last piece of the transcript is left as-is.
 */
export function mergeShortPieces(
  input: Piece[],
  minChunkSize: number,
  maxChunkSize: number,
): Piece[] {
  const pieces: Piece[] = input.map((p) => ({ ...p }));
  const out: Piece[] = [];

  for (let i = 0; i < pieces.length; i++) {
    const piece = pieces[i];
    if (!piece) continue;
    const isLast = i === pieces.length - 1;
    if (size(piece) >= minChunkSize || isLast) {
      out.push(piece);
      continue;
    }

    const prev = out[out.length - 1];
    const next = pieces[i + 1];
    const prevFits = prev !== undefined && size(prev) + size(piece) <= maxChunkSize;
    const nextFits = next !== undefined && size(next) + size(piece) <= maxChunkSize;

    let target: 'prev' | 'next' | null = null;
    if (prevFits && nextFits && prev && next) {
      const prevTopic = piece.topicBefore;
      const nextTopic = next.topicBefore;
      if (prevTopic !== nextTopic) {
        target = prevTopic ? 'next' : 'prev';
      } else {
        target = size(prev) <= size(next) ? 'prev' : 'next';
      }
    } else if (prevFits) {
      target = 'prev';
    } else if (nextFits) {
      target = 'next';
    }

    if (target === 'prev' && prev) {
      out[out.length - 1] = { ...prev, tokenEnd: piece.tokenEnd };
    } else if (target === 'next' && next) {
      pieces[i + 1] = { ...next, tokenStart: piece.tokenStart, topicBefore: piece.topicBefore };
    } else {
      // topic-shift chunk: merging either way would exceed max
      out.push(piece);
    }
  }
  return out;
}

export class EmbeddingRefiner implements ChunkRefiner {
  constructor(
    private readonly embedder: Embedder,
    private readonly options: EmbeddingRefinerOptions,
  ) {}

  async refine(chunks: RawChunk[], text: string): Promise<RawChunk[]> {
    if (chunks.length === 0) return chunks;
    const tokens = tokenize(text);

    const unitsPerChunk = chunks.map((c) => sentenceUnits(text, tokens, c.tokenStart, c.tokenEnd));
    const unitTexts: string[] = [];
    for (const units of unitsPerChunk) {
      for (const [a, b] of units) {
        unitTexts.push(toRawChunk(text, tokens, a, b).text.trim());
      }
    }

    const vectors = unitTexts.length > chunks.length ? await this.embedder.embed(unitTexts) : [];

    const pieces: Piece[] = [];
    let v = 0;
    for (const units of unitsPerChunk) {
      let current: Piece | null = null;
      let prevVector: number[] | undefined;
      for (const [a, b] of units) {
        const vector = vectors[v++];
        const shift =
          current !== null &&
          prevVector !== undefined &&
          vector !== undefined &&
          cosineSimilarity(prevVector, vector) < this.options.similarityThreshold;

        if (current === null) {
          current = { tokenStart: a, tokenEnd: b, topicBefore: false };
        } else if (shift) {
          pieces.push(current);
          current = { tokenStart: a, tokenEnd: b, topicBefore: true };
        } else {
          current.tokenEnd = b;
        }
        prevVector = vector;
      }
      if (current) pieces.push(current);
    }

    const merged = mergeShortPieces(pieces, this.options.minChunkSize, this.options.maxChunkSize);
    return merged.map((p) => toRawChunk(text, tokens, p.tokenStart, p.tokenEnd));
  }
}
