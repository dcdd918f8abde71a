/**
 * FILE PURPOSE: Overlap stitcher — token overlap, stable ids, parent blocks
 *
 * WHY: Context at a chunk boundary is lost to both neighbours unless it is
 *      repeated. The own-span offsets are kept apart from the stored text so the
 *      context assembler can remove the repetition again.
 * HOW: Chunk i>0 stores the last `overlapSize` tokens of chunk i-1's own span
 *      followed by its own span. Ids are `<sourceId>:<ordinal>`. With hierarchy
 *      on, consecutive chunks are grouped greedily into parent blocks of at most
 *      `parentMaxSize` tokens, the last one topped up towards `parentMinSize`;
 *      parents reference children by id only.
 */

import type { Chunk, ChunkMetadata, ParentBlock, RawChunk } from '../types.js';
import { chunkId, parentId } from '../types.js';
import { tokenize, tokenOffset } from '../tokenizer.js';

export interface HierarchyOptions {
  parentMinSize: number;
  parentMaxSize: number;
}

export interface StitchOptions {
  sourceId: string;
  /** The normalized text the raw chunks were cut from. */
  text: string;
  overlapSize: number;
  metadata: ChunkMetadata;
  hierarchy?: HierarchyOptions;
}

export interface StitchResult {
  chunks: Chunk[];
  parents: ParentBlock[];
}

/**
 * Group consecutive chunks into runs of at most `parentMaxSize` own-span tokens.
 * A run closes only when the next chunk would overflow it. An undersized last
 * run takes trailing chunks from its predecessor while both stay in bounds.
 */
export function groupParents(chunks: Chunk[], options: HierarchyOptions): Chunk[][] {
  const groups: Chunk[][] = [];
  let current: Chunk[] = [];
  let currentSize = 0;

  for (const chunk of chunks) {
    if (current.length > 0 && currentSize + chunk.tokenCount > options.parentMaxSize) {
      groups.push(current);
      current = [];
      currentSize = 0;
    }
    current.push(chunk);
    currentSize += chunk.tokenCount;
  }
  if (current.length > 0) groups.push(current);

  const tail = groups[groups.length - 1];
  const beforeTail = groups[groups.length - 2];
  if (tail && beforeTail) {
    let tailSize = tail.reduce((sum, c) => sum + c.tokenCount, 0);
    let beforeSize = beforeTail.reduce((sum, c) => sum + c.tokenCount, 0);
    while (tailSize < options.parentMinSize && beforeTail.length > 1) {
      const moved = beforeTail[beforeTail.length - 1];
      if (!moved) break;
      if (tailSize + moved.tokenCount > options.parentMaxSize) break;
      if (beforeSize - moved.tokenCount < options.parentMinSize) break;
      beforeTail.pop();
      tail.unshift(moved);
      tailSize += moved.tokenCount;
      beforeSize -= moved.tokenCount;
    }
  }
  return groups;
}

export function stitch(rawChunks: RawChunk[], options: StitchOptions): StitchResult {
  const { sourceId, text, overlapSize, metadata, hierarchy } = options;
  const tokens = tokenize(text);

  const chunks: Chunk[] = rawChunks.map((raw, ordinal) => {
    const prev = ordinal > 0 ? rawChunks[ordinal - 1] : undefined;
    let overlapStart = raw.start;
    let overlapTokenCount = 0;
    if (prev && overlapSize > 0) {
      const firstOverlapToken = Math.max(prev.tokenStart, prev.tokenEnd - overlapSize);
      overlapTokenCount = prev.tokenEnd - firstOverlapToken;
      overlapStart = tokenOffset(tokens, firstOverlapToken, text.length);
    }
    return {
      id: chunkId(sourceId, ordinal),
      sourceId,
      ordinal,
      text: text.slice(overlapStart, raw.end),
      tokenCount: raw.tokenCount,
      overlapTokenCount,
      start: raw.start,
      end: raw.end,
      overlapStart,
      metadata,
    };
  });

  if (!hierarchy) return { chunks, parents: [] };

  const parents: ParentBlock[] = [];
  const linked: Chunk[] = [];
  groupParents(chunks, hierarchy).forEach((group, ordinal) => {
    const first = group[0];
    const last = group[group.length - 1];
    if (!first || !last) return;
    const id = parentId(sourceId, ordinal);
    parents.push({
      id,
      sourceId,
      ordinal,
      text: text.slice(first.start, last.end),
      tokenCount: group.reduce((sum, c) => sum + c.tokenCount, 0),
      start: first.start,
      end: last.end,
      childIds: group.map((c) => c.id),
    });
    for (const child of group) linked.push({ ...child, parentId: id });
  });

  return { chunks: linked, parents };
}
