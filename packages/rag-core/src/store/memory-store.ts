/**
 * FILE PURPOSE: In-process vector store with snapshot-swap writes
 *
 * WHY: Local runs and tests need a store with the same guarantees as pgvector
 *      without a database.
 * HOW: State lives in an immutable snapshot. Every write builds a new snapshot
 *      and swaps the reference in one assignment, so concurrent searches keep
 *      reading the snapshot they started with. No locks on the read path.
 *      Search is an exact cosine scan.
 */

import { ConfigurationError } from '../errors.js';
import { cosineSimilarity } from '../similarity.js';
import type { EmbeddingRecord, ParentBlock } from '../types.js';
import { sourcePrefix } from '../types.js';
import { compareScored, type ScoredRecord, type VectorStore, type VectorStoreStats } from './types.js';

interface Snapshot {
  readonly modelId: string | null;
  readonly records: ReadonlyMap<string, EmbeddingRecord>;
  readonly parents: ReadonlyMap<string, ParentBlock>;
}

export class InMemoryVectorStore implements VectorStore {
  private snapshot: Snapshot = { modelId: null, records: new Map(), parents: new Map() };

  async getModelId(): Promise<string | null> {
    return this.snapshot.modelId;
  }

  private assertModel(modelId: string): void {
    const current = this.snapshot.modelId;
    if (current !== null && current !== modelId) {
      throw new ConfigurationError(
        `Embedding model mismatch: store was built with "${current}", write uses "${modelId}"`,
      );
    }
  }

  /** An emptied store forgets its model so it can be rebuilt with another one. */
  private commit(
    modelId: string | null,
    records: Map<string, EmbeddingRecord>,
    parents: Map<string, ParentBlock>,
  ): void {
    const empty = records.size === 0 && parents.size === 0;
    this.snapshot = { modelId: empty ? null : modelId, records, parents };
  }

  async replaceSource(
    sourceId: string,
    modelId: string,
    records: EmbeddingRecord[],
    parents: ParentBlock[],
  ): Promise<void> {
    this.assertModel(modelId);
    const prefix = sourcePrefix(sourceId);
    const nextRecords = new Map([...this.snapshot.records].filter(([id]) => !id.startsWith(prefix)));
    const nextParents = new Map([...this.snapshot.parents].filter(([id]) => !id.startsWith(prefix)));
    for (const record of records) nextRecords.set(record.chunkId, record);
    for (const parent of parents) nextParents.set(parent.id, parent);
    this.commit(modelId, nextRecords, nextParents);
  }

  async upsert(modelId: string, records: EmbeddingRecord[], parents: ParentBlock[] = []): Promise<void> {
    this.assertModel(modelId);
    const nextRecords = new Map(this.snapshot.records);
    const nextParents = new Map(this.snapshot.parents);
    for (const record of records) nextRecords.set(record.chunkId, record);
    for (const parent of parents) nextParents.set(parent.id, parent);
    this.commit(modelId, nextRecords, nextParents);
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    const { records, parents, modelId } = this.snapshot;
    const nextRecords = new Map([...records].filter(([id]) => !id.startsWith(prefix)));
    const nextParents = new Map([...parents].filter(([id]) => !id.startsWith(prefix)));
    this.commit(modelId, nextRecords, nextParents);
    return records.size - nextRecords.size;
  }

  async search(vector: number[], topK: number): Promise<ScoredRecord[]> {
    const { records } = this.snapshot;
    const scored: ScoredRecord[] = [];
    for (const record of records.values()) {
      scored.push({ record, score: cosineSimilarity(vector, record.vector) });
    }
    return scored.sort(compareScored).slice(0, Math.max(0, topK));
  }

  async getParents(ids: string[]): Promise<Map<string, ParentBlock>> {
    const { parents } = this.snapshot;
    const found = new Map<string, ParentBlock>();
    for (const id of ids) {
      const parent = parents.get(id);
      if (parent) found.set(id, parent);
    }
    return found;
  }

  async listChunkIds(prefix = ''): Promise<string[]> {
    return [...this.snapshot.records.keys()].filter((id) => id.startsWith(prefix)).sort();
  }

  async stats(): Promise<VectorStoreStats> {
    const { records, parents, modelId } = this.snapshot;
    const bySource = new Map<string, number>();
    for (const record of records.values()) {
      bySource.set(record.sourceId, (bySource.get(record.sourceId) ?? 0) + 1);
    }
    return {
      modelId,
      chunkCount: records.size,
      parentCount: parents.size,
      sources: [...bySource]
        .map(([sourceId, chunkCount]) => ({ sourceId, chunkCount }))
        .sort((a, b) => a.sourceId.localeCompare(b.sourceId)),
    };
  }
}
