/**
 * FILE PURPOSE: VectorStore over Postgres + pgvector (drizzle-orm, postgres.js)
 *
 * WHY: Production index shared by the worker (writes) and the chat API (reads).
 * HOW: Every write runs in one transaction that first locks the manifest row,
 *      so a model mismatch aborts before anything changes and readers only
 *      see committed chunk sets. Search orders by cosine distance (`<=>`),
 *      ties by ordinal then source id.
 */

import { asc, count, eq, inArray, like, sql } from 'drizzle-orm';
import {
  ConfigurationError,
  type Chunk,
  type EmbeddingRecord,
  type ParentBlock,
  type ScoredRecord,
  type VectorStore,
  type VectorStoreStats,
} from '@transcript-rag/core';
import type { Database } from '../db/connection.js';
import {
  EMBEDDING_DIMENSIONS,
  indexManifest,
  parentBlocks,
  toVectorLiteral,
  transcriptChunks,
} from '../db/schema.js';

type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];
type ChunkRow = typeof transcriptChunks.$inferSelect;
type ParentRow = typeof parentBlocks.$inferSelect;

const MANIFEST_ID = 'default';

/** Escape LIKE wildcards so a prefix matches literally. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

export function toChunkRow(record: EmbeddingRecord): typeof transcriptChunks.$inferInsert {
  const { chunk } = record;
  return {
    id: record.chunkId,
    sourceId: record.sourceId,
    ordinal: chunk.ordinal,
    text: chunk.text,
    tokenCount: chunk.tokenCount,
    overlapTokenCount: chunk.overlapTokenCount,
    startOffset: chunk.start,
    endOffset: chunk.end,
    overlapStart: chunk.overlapStart,
    parentId: chunk.parentId ?? null,
    metadata: chunk.metadata,
    embedding: record.vector,
    modelId: record.modelId,
  };
}

export function fromChunkRow(row: ChunkRow): EmbeddingRecord {
  const chunk: Chunk = {
    id: row.id,
    sourceId: row.sourceId,
    ordinal: row.ordinal,
    text: row.text,
    tokenCount: row.tokenCount,
    overlapTokenCount: row.overlapTokenCount,
    start: row.startOffset,
    end: row.endOffset,
    overlapStart: row.overlapStart,
    metadata: row.metadata,
  };
  if (row.parentId) chunk.parentId = row.parentId;
  return { chunkId: row.id, sourceId: row.sourceId, vector: row.embedding, modelId: row.modelId, chunk };
}

export function toParentRow(parent: ParentBlock): typeof parentBlocks.$inferInsert {
  return {
    id: parent.id,
    sourceId: parent.sourceId,
    ordinal: parent.ordinal,
    text: parent.text,
    tokenCount: parent.tokenCount,
    startOffset: parent.start,
    endOffset: parent.end,
    childIds: parent.childIds,
  };
}

export function fromParentRow(row: ParentRow): ParentBlock {
  return {
    id: row.id,
    sourceId: row.sourceId,
    ordinal: row.ordinal,
    text: row.text,
    tokenCount: row.tokenCount,
    start: row.startOffset,
    end: row.endOffset,
    childIds: row.childIds,
  };
}

export interface PgVectorStoreOptions {
  dimensions?: number;
}

export class PgVectorStore implements VectorStore {
  private readonly dimensions: number;

  constructor(
    private readonly db: Database,
    options: PgVectorStoreOptions = {},
  ) {
    this.dimensions = options.dimensions ?? EMBEDDING_DIMENSIONS;
  }

  async getModelId(): Promise<string | null> {
    const [row] = await this.db
      .select({ modelId: indexManifest.modelId })
      .from(indexManifest)
      .where(eq(indexManifest.id, MANIFEST_ID))
      .limit(1);
    return row?.modelId ?? null;
  }

  private assertDimensions(records: EmbeddingRecord[]): void {
    const wrong = records.find((r) => r.vector.length !== this.dimensions);
    if (wrong) {
      throw new ConfigurationError(
        `${wrong.chunkId} has ${wrong.vector.length} dimensions; the vector column holds ${this.dimensions}`,
      );
    }
  }

  /** Lock the manifest row, refuse a foreign model, record ours when the index is new. */
  private async claimModel(tx: Transaction, modelId: string): Promise<void> {
    const [row] = await tx
      .select({ modelId: indexManifest.modelId })
      .from(indexManifest)
      .where(eq(indexManifest.id, MANIFEST_ID))
      .for('update');
    if (row && row.modelId !== modelId) {
      throw new ConfigurationError(
        `Embedding model mismatch: store was built with "${row.modelId}", write uses "${modelId}"`,
      );
    }
    if (!row) {
      await tx
        .insert(indexManifest)
        .values({ id: MANIFEST_ID, modelId, dimensions: this.dimensions })
        .onConflictDoNothing();
    }
  }

  /** An emptied index forgets its model so it can be rebuilt with another one. */
  private async releaseModelIfEmpty(tx: Transaction): Promise<void> {
    const [chunks] = await tx.select({ n: count() }).from(transcriptChunks);
    const [parents] = await tx.select({ n: count() }).from(parentBlocks);
    if ((chunks?.n ?? 0) === 0 && (parents?.n ?? 0) === 0) {
      await tx.delete(indexManifest).where(eq(indexManifest.id, MANIFEST_ID));
    }
  }

  async replaceSource(
    sourceId: string,
    modelId: string,
    records: EmbeddingRecord[],
    parents: ParentBlock[],
  ): Promise<void> {
    this.assertDimensions(records);
    await this.db.transaction(async (tx) => {
      await this.claimModel(tx, modelId);
      await tx.delete(transcriptChunks).where(eq(transcriptChunks.sourceId, sourceId));
      await tx.delete(parentBlocks).where(eq(parentBlocks.sourceId, sourceId));
      if (records.length > 0) await tx.insert(transcriptChunks).values(records.map(toChunkRow));
      if (parents.length > 0) await tx.insert(parentBlocks).values(parents.map(toParentRow));
      await this.releaseModelIfEmpty(tx);
    });
  }

  async upsert(modelId: string, records: EmbeddingRecord[], parents: ParentBlock[] = []): Promise<void> {
    this.assertDimensions(records);
    if (records.length === 0 && parents.length === 0) return;
    await this.db.transaction(async (tx) => {
      await this.claimModel(tx, modelId);
      if (records.length > 0) {
        await tx.delete(transcriptChunks).where(inArray(transcriptChunks.id, records.map((r) => r.chunkId)));
        await tx.insert(transcriptChunks).values(records.map(toChunkRow));
      }
      if (parents.length > 0) {
        await tx.delete(parentBlocks).where(inArray(parentBlocks.id, parents.map((p) => p.id)));
        await tx.insert(parentBlocks).values(parents.map(toParentRow));
      }
    });
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    const pattern = `${escapeLike(prefix)}%`;
    return this.db.transaction(async (tx) => {
      const removed = await tx
        .delete(transcriptChunks)
        .where(like(transcriptChunks.id, pattern))
        .returning({ id: transcriptChunks.id });
      await tx.delete(parentBlocks).where(like(parentBlocks.id, pattern));
      await this.releaseModelIfEmpty(tx);
      return removed.length;
    });
  }

  async search(vector: number[], topK: number): Promise<ScoredRecord[]> {
    if (topK < 1) return [];
    const modelId = await this.getModelId();
    if (modelId === null) return [];

    const distance = sql<number>`${transcriptChunks.embedding} <=> ${toVectorLiteral(vector)}::vector`;
    const rows = await this.db
      .select({
        chunk: transcriptChunks,
        score: sql<number>`1 - (${distance})`.mapWith(Number),
      })
      .from(transcriptChunks)
      .where(eq(transcriptChunks.modelId, modelId))
      .orderBy(distance, asc(transcriptChunks.ordinal), asc(transcriptChunks.sourceId))
      .limit(topK);

    return rows.map((row) => ({ record: fromChunkRow(row.chunk), score: row.score }));
  }

  async getParents(ids: string[]): Promise<Map<string, ParentBlock>> {
    const found = new Map<string, ParentBlock>();
    if (ids.length === 0) return found;
    const rows = await this.db.select().from(parentBlocks).where(inArray(parentBlocks.id, ids));
    for (const row of rows) found.set(row.id, fromParentRow(row));
    return found;
  }

  async listChunkIds(prefix = ''): Promise<string[]> {
    const rows = await this.db
      .select({ id: transcriptChunks.id })
      .from(transcriptChunks)
      .where(like(transcriptChunks.id, `${escapeLike(prefix)}%`))
      .orderBy(asc(transcriptChunks.id));
    return rows.map((r) => r.id);
  }

  async stats(): Promise<VectorStoreStats> {
    const modelId = await this.getModelId();
    const sources = await this.db
      .select({ sourceId: transcriptChunks.sourceId, chunkCount: count() })
      .from(transcriptChunks)
      .groupBy(transcriptChunks.sourceId)
      .orderBy(asc(transcriptChunks.sourceId));
    const [parents] = await this.db.select({ n: count() }).from(parentBlocks);
    return {
      modelId,
      chunkCount: sources.reduce((sum, s) => sum + s.chunkCount, 0),
      parentCount: parents?.n ?? 0,
      sources,
    };
  }
}
