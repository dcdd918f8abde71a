/**
 * FILE PURPOSE: Build the prompt context block from retrieved chunks under a token budget
 *
 * WHY: Neighbouring chunks share their overlap, and several hits can fall inside
 *      one parent block. Pasting them as-is repeats text and wastes budget.
 * HOW: Walk hits best-first. Each hit contributes a character range of its
 *      transcript (the parent block when attached and it fits, else the stored
 *      chunk text); ranges already emitted for that transcript are subtracted. Segments are
 *      whole: the first one that does not fit ends the window, so what gets cut
 *      is always the lowest-scoring tail.
 */

import { ConfigurationError } from '../errors.js';
import { compareRanked } from '../store/types.js';
import { countTokens } from '../tokenizer.js';
import type { RetrievalHit, RetrievalResult } from './retriever.js';

export interface ContextSegment {
  sourceId: string;
  /** Header line plus body, as it appears in the window. */
  text: string;
  chunkIds: string[];
  score: number;
  tokenCount: number;
}

export interface ContextWindow {
  text: string;
  segments: ContextSegment[];
  tokenCount: number;
  tokenBudget: number;
  /** True when at least one non-duplicate hit was left out for budget. */
  truncated: boolean;
}

type Range = [start: number, end: number];

export const SEGMENT_SEPARATOR = '\n\n';

export function segmentHeader(hit: RetrievalHit): string {
  const title = hit.chunk.metadata.title;
  return `[source: ${typeof title === 'string' && title.trim() !== '' ? title.trim() : hit.chunk.sourceId}]`;
}

/** Parts of `range` not covered by any of `covered` (sorted, non-overlapping result). */
export function subtractRanges(range: Range, covered: readonly Range[]): Range[] {
  const sorted = [...covered].sort((a, b) => a[0] - b[0]);
  const out: Range[] = [];
  let cursor = range[0];
  for (const [start, end] of sorted) {
    if (end <= cursor || start >= range[1]) continue;
    if (start > cursor) out.push([cursor, start]);
    cursor = Math.max(cursor, end);
    if (cursor >= range[1]) break;
  }
  if (cursor < range[1]) out.push([cursor, range[1]]);
  return out;
}

interface Span {
  range: Range;
  text: string;
  offset: number;
  chunkIds: string[];
}

/** Candidate spans for a hit, widest first: the parent block, then the chunk itself. */
function hitSpans(hit: RetrievalHit): Span[] {
  const own: Span = {
    range: [hit.chunk.overlapStart, hit.chunk.end],
    text: hit.chunk.text,
    offset: hit.chunk.overlapStart,
    chunkIds: [hit.chunk.id],
  };
  if (!hit.parent) return [own];
  return [
    {
      range: [hit.parent.start, hit.parent.end],
      text: hit.parent.text,
      offset: hit.parent.start,
      chunkIds: hit.parent.childIds,
    },
    own,
  ];
}

function freshBody(span: Span, fresh: readonly Range[]): string {
  return fresh
    .map(([start, end]) => span.text.slice(start - span.offset, end - span.offset).trim())
    .filter((piece) => piece !== '')
    .join('\n');
}

export function assembleContext(result: RetrievalResult, tokenBudget: number): ContextWindow {
  if (!Number.isInteger(tokenBudget) || tokenBudget < 0) {
    throw new ConfigurationError(`Context token budget must be a non-negative integer, got ${tokenBudget}`);
  }

  const covered = new Map<string, Range[]>();
  const segments: ContextSegment[] = [];
  let used = 0;
  let truncated = false;

  for (const hit of [...result.hits].sort(compareRanked)) {
    const seen = covered.get(hit.chunk.sourceId) ?? [];
    let placed: { segment: ContextSegment; fresh: Range[] } | null = null;
    let alreadyCovered = false;

    // A parent block larger than what is left falls back to the chunk alone.
    for (const span of hitSpans(hit)) {
      const fresh = subtractRanges(span.range, seen);
      const body = freshBody(span, fresh);
      if (body === '') {
        alreadyCovered = true;
        break;
      }
      const segmentText = `${segmentHeader(hit)}\n${body}`;
      const tokenCount = countTokens(segmentText);
      if (used + tokenCount <= tokenBudget) {
        const segment: ContextSegment = {
          sourceId: hit.chunk.sourceId,
          text: segmentText,
          chunkIds: span.chunkIds,
          score: hit.score,
          tokenCount,
        };
        placed = { segment, fresh };
        break;
      }
    }

    if (alreadyCovered) continue;
    if (!placed) {
      truncated = true;
      break;
    }

    segments.push(placed.segment);
    covered.set(hit.chunk.sourceId, [...seen, ...placed.fresh]);
    used += placed.segment.tokenCount;
  }

  return {
    text: segments.map((s) => s.text).join(SEGMENT_SEPARATOR),
    segments,
    tokenCount: used,
    tokenBudget,
    truncated,
  };
}
