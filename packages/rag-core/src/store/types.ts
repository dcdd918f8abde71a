/**
 * FILE PURPOSE: Vector store contract used by the indexer and retriever
 *
 * WHY: The pipeline is storage-agnostic; in-memory for tests and local runs,
 *      pgvector in the worker. Both honour the same read/write guarantees:
 *      readers never observe a half-applied write, and one transcript is replaced
 *      as a unit.
 */

import type { Chunk, EmbeddingRecord, ParentBlock } from '../types.js';

export interface ScoredRecord {
  record: EmbeddingRecord;
  score: number;
}

export interface SourceStats {
  sourceId: string;
  chunkCount: number;
}

export interface VectorStoreStats {
  modelId: string | null;
  chunkCount: number;
  parentCount: number;
  sources: SourceStats[];
}

export interface VectorStore {
  /** Embedding model the stored vectors were built with; null when nothing was ever indexed. */
  getModelId(): Promise<string | null>;

  /**
   * Atomically swap every chunk and parent of `sourceId` for the given set.
   * Throws ConfigurationError when `modelId` differs from the recorded one.
   */
  replaceSource(
    sourceId: string,
    modelId: string,
    records: EmbeddingRecord[],
    parents: ParentBlock[],
  ): Promise<void>;

  upsert(modelId: string, records: EmbeddingRecord[], parents?: ParentBlock[]): Promise<void>;

  /** Remove chunks and parents whose id starts with `prefix`; returns the chunk count removed. */
  deleteByPrefix(prefix: string): Promise<number>;

  /**
   * Top-k by cosine similarity, descending; ties by chunk ordinal then source id.
   * Returns everything when topK exceeds the record count.
   */
  search(vector: number[], topK: number): Promise<ScoredRecord[]>;

  getParents(ids: string[]): Promise<Map<string, ParentBlock>>;

  listChunkIds(prefix?: string): Promise<string[]>;

  stats(): Promise<VectorStoreStats>;
}

/** Score descending; ties by chunk ordinal, then source id. */
export function compareRanked(a: { score: number; chunk: Chunk }, b: { score: number; chunk: Chunk }): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.chunk.ordinal !== b.chunk.ordinal) return a.chunk.ordinal - b.chunk.ordinal;
  return a.chunk.sourceId < b.chunk.sourceId ? -1 : a.chunk.sourceId > b.chunk.sourceId ? 1 : 0;
}

export function compareScored(a: ScoredRecord, b: ScoredRecord): number {
  return compareRanked({ score: a.score, chunk: a.record.chunk }, { score: b.score, chunk: b.record.chunk });
}
