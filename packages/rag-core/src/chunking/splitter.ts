/**
 * FILE PURPOSE: Recursive delimiter-hierarchy splitter with token-count bounds
 *
 * WHY: Transcripts have no timestamps or headings; paragraph, line and sentence
 *      breaks are the only structure. Cutting at the strongest one that fits keeps
 *      chunks coherent while holding every non-final chunk inside [min, max].
 * HOW: Walk the token stream. For each chunk, try each delimiter level in order
 *      and take the furthest cut inside [min, max]; fall back to a hard cut at max.
 */

import type { RawChunk } from '../types.js';
import { tokenize, tokenOffset, type Token } from '../tokenizer.js';

export interface SplitOptions {
  maxChunkSize: number;
  minChunkSize: number;
}

/** Delimiter hierarchy, highest priority first. Values are gap levels. */
export const DelimiterLevel = {
  PARAGRAPH: 0,
  LINE: 1,
  SENTENCE: 2,
  NONE: 3,
} as const;

export type DelimiterLevelValue = (typeof DelimiterLevel)[keyof typeof DelimiterLevel];

const HIERARCHY: DelimiterLevelValue[] = [
  DelimiterLevel.PARAGRAPH,
  DelimiterLevel.LINE,
  DelimiterLevel.SENTENCE,
];

const SENTENCE_TERMINATOR_RE = /[.!?…]["'”’)\]]*$/;

/**
 * Level of the gap before token `index` (between tokens index-1 and index).
 */
export function gapLevel(text: string, tokens: Token[], index: number): DelimiterLevelValue {
  const prev = tokens[index - 1];
  const next = tokens[index];
  if (!prev || !next) return DelimiterLevel.NONE;
  const gap = text.slice(prev.end, next.start);
  if (/\n[^\S\n]*\n/.test(gap)) return DelimiterLevel.PARAGRAPH;
  if (gap.includes('\n')) return DelimiterLevel.LINE;
  if (SENTENCE_TERMINATOR_RE.test(prev.text)) return DelimiterLevel.SENTENCE;
  return DelimiterLevel.NONE;
}

export function toRawChunk(text: string, tokens: Token[], tokenStart: number, tokenEnd: number): RawChunk {
  const start = tokenStart === 0 ? 0 : tokenOffset(tokens, tokenStart, text.length);
  const end = tokenEnd >= tokens.length ? text.length : tokenOffset(tokens, tokenEnd, text.length);
  return {
    text: text.slice(start, end),
    start,
    end,
    tokenStart,
    tokenEnd,
    tokenCount: tokenEnd - tokenStart,
  };
}

function findCut(
  levels: DelimiterLevelValue[],
  gaps: DelimiterLevelValue[],
  lo: number,
  hi: number,
): number | null {
  const [level, ...rest] = levels;
  if (level === undefined) return null;
  // furthest first: the cut closest to max wins within a level
  for (let k = hi; k >= lo; k--) {
    if (gaps[k] === level) return k;
  }
  return findCut(rest, gaps, lo, hi);
}

export function splitText(text: string, options: SplitOptions): RawChunk[] {
  const { maxChunkSize, minChunkSize } = options;
  const tokens = tokenize(text);
  const n = tokens.length;
  if (n === 0) return [];

  const gaps: DelimiterLevelValue[] = tokens.map((_, i) => gapLevel(text, tokens, i));
  const chunks: RawChunk[] = [];

  let start = 0;
  while (start < n) {
    if (n - start <= maxChunkSize) {
      chunks.push(toRawChunk(text, tokens, start, n));
      break;
    }
    const lo = start + Math.max(1, minChunkSize);
    const hi = start + maxChunkSize;
    const end = findCut(HIERARCHY, gaps, lo, hi) ?? hi;
    chunks.push(toRawChunk(text, tokens, start, end));
    start = end;
  }

  return chunks;
}
