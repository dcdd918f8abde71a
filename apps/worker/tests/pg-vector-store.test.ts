/**
 * Tests for the pgvector store (store/pg-vector-store.ts)
 *
 * Row mapping is pure; the write guards are exercised against a fake Drizzle
 * transaction so no database is needed.
 */

import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError, type EmbeddingRecord } from '@transcript-rag/core';
import type { Database } from '../src/db/connection.js';
import { parseVectorLiteral, toVectorLiteral, type transcriptChunks } from '../src/db/schema.js';
import {
  PgVectorStore,
  escapeLike,
  fromChunkRow,
  fromParentRow,
  toChunkRow,
  toParentRow,
} from '../src/store/pg-vector-store.js';

const record: EmbeddingRecord = {
  chunkId: 'vid1:1',
  sourceId: 'vid1',
  vector: [0.5, 0.25, 1],
  modelId: 'test-embed',
  chunk: {
    id: 'vid1:1',
    sourceId: 'vid1',
    ordinal: 1,
    text: 'c d e f',
    tokenCount: 2,
    overlapTokenCount: 2,
    start: 4,
    end: 11,
    overlapStart: 0,
    parentId: 'vid1:parent:0',
    metadata: { title: 'Talk' },
  },
};

/** A transaction whose manifest lookup yields `manifest`; writes are recorded. */
function fakeDb(manifest: Array<{ modelId: string }>) {
  const forUpdate = vi.fn().mockResolvedValue(manifest);
  const where = vi.fn().mockReturnValue({ for: forUpdate });
  const from = vi.fn().mockReturnValue({ where });
  const tx = {
    select: vi.fn().mockReturnValue({ from }),
    delete: vi.fn(),
    insert: vi.fn(),
  };
  const transaction = vi.fn(async (fn: (t: typeof tx) => Promise<unknown>) => fn(tx));
  const db = { transaction } as unknown as Database;
  return { db, tx, transaction };
}

describe('escapeLike', () => {
  it('escapes LIKE wildcards and the escape character', () => {
    expect(escapeLike('a_b%c\\d:')).toBe('a\\_b\\%c\\\\d:');
  });
});

describe('vector literals', () => {
  it('formats and parses the pgvector text form', () => {
    expect(toVectorLiteral([0.5, -1, 2])).toBe('[0.5,-1,2]');
    expect(parseVectorLiteral('[0.5,-1,2]')).toEqual([0.5, -1, 2]);
    expect(parseVectorLiteral('[]')).toEqual([]);
  });
});

describe('row mapping', () => {
  it('maps a chunk record to a row and back', () => {
    const inserted = toChunkRow(record);
    expect(inserted).toMatchObject({ startOffset: 4, endOffset: 11, overlapStart: 0, parentId: 'vid1:parent:0' });

    const row: typeof transcriptChunks.$inferSelect = {
      id: 'vid1:1',
      sourceId: 'vid1',
      ordinal: 1,
      text: 'c d e f',
      tokenCount: 2,
      overlapTokenCount: 2,
      startOffset: 4,
      endOffset: 11,
      overlapStart: 0,
      parentId: 'vid1:parent:0',
      metadata: { title: 'Talk' },
      embedding: [0.5, 0.25, 1],
      modelId: 'test-embed',
      createdAt: new Date('2024-01-01T00:00:00Z'),
    };
    expect(fromChunkRow(row)).toEqual(record);
  });

  it('leaves parentId off chunks without a parent', () => {
    const row = { ...toChunkRow(record), parentId: null, createdAt: new Date('2024-01-01T00:00:00Z') };
    const restored = fromChunkRow(row);
    expect('parentId' in restored.chunk).toBe(false);
  });

  it('maps parent blocks both ways', () => {
    const parent = {
      id: 'vid1:parent:0',
      sourceId: 'vid1',
      ordinal: 0,
      text: 'a b c d e f',
      tokenCount: 6,
      start: 0,
      end: 11,
      childIds: ['vid1:0', 'vid1:1'],
    };
    expect(fromParentRow({ ...toParentRow(parent), createdAt: new Date('2024-01-01T00:00:00Z') })).toEqual(parent);
  });
});

describe('PgVectorStore write guards', () => {
  it('rejects vectors of the wrong width before opening a transaction', async () => {
    const { db, transaction } = fakeDb([]);
    const store = new PgVectorStore(db, { dimensions: 4 });

    await expect(store.replaceSource('vid1', 'test-embed', [record], [])).rejects.toThrow(
      'vid1:1 has 3 dimensions; the vector column holds 4',
    );
    expect(transaction).not.toHaveBeenCalled();
  });

  it('refuses a write from another model before deleting anything', async () => {
    const { db, tx } = fakeDb([{ modelId: 'other-model' }]);
    const store = new PgVectorStore(db, { dimensions: 3 });

    await expect(store.replaceSource('vid1', 'test-embed', [record], [])).rejects.toThrow(ConfigurationError);
    expect(tx.delete).not.toHaveBeenCalled();
    expect(tx.insert).not.toHaveBeenCalled();
  });

  it('skips the transaction for an empty upsert', async () => {
    const { db, transaction } = fakeDb([]);
    await new PgVectorStore(db, { dimensions: 3 }).upsert('test-embed', []);
    expect(transaction).not.toHaveBeenCalled();
  });
});
