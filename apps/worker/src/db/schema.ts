/**
 * FILE PURPOSE: Database schema — transcript_chunks, parent_blocks, index_manifest
 *
 * WHY: pgvector is the production vector store. Chunk ids are the
 *      "<sourceId>:<ordinal>" keys from the chunker, so re-indexing a transcript
 *      is a delete-by-source plus insert inside one transaction.
 *
 * HOW: Drizzle ORM schema definitions. Run `npm run db:push -w @transcript-rag/worker`
 *      to sync to DB. `EMBEDDING_DIMENSIONS` must match the embedding model
 *      (1536 for text-embedding-3-small).
 */

import {
  pgTable,
  text,
  integer,
  timestamp,
  index,
  jsonb,
  customType,
} from 'drizzle-orm/pg-core';
import type { ChunkMetadata } from '@transcript-rag/core';

export const EMBEDDING_DIMENSIONS = Number(process.env.EMBEDDING_DIMENSIONS) || 1536;

/** pgvector text literal, e.g. "[0.1,0.2]". */
export function toVectorLiteral(value: number[]): string {
  return `[${value.join(',')}]`;
}

export function parseVectorLiteral(value: unknown): number[] {
  const str = typeof value === 'string' ? value : String(value);
  const body = str.replace(/^\[/, '').replace(/\]$/, '').trim();
  return body === '' ? [] : body.split(',').map(Number);
}

// ─── Custom pgvector type ────────────────────────────────────────────────────
const vector = customType<{ data: number[]; driverParam: string; config: { dimensions: number } }>({
  dataType(config) {
    return `vector(${config?.dimensions ?? EMBEDDING_DIMENSIONS})`;
  },
  toDriver(value: number[]): string {
    return toVectorLiteral(value);
  },
  fromDriver(value: unknown): number[] {
    return parseVectorLiteral(value);
  },
});

// ─── Table 1: transcript_chunks ─────────────────────────────────────────────
// One row per live chunk. Offsets refer to the normalized transcript text.
export const transcriptChunks = pgTable(
  'transcript_chunks',
  {
    id: text('id').primaryKey(),
    sourceId: text('source_id').notNull(),
    ordinal: integer('ordinal').notNull(),
    text: text('text').notNull(),
    tokenCount: integer('token_count').notNull(),
    overlapTokenCount: integer('overlap_token_count').notNull(),
    startOffset: integer('start_offset').notNull(),
    endOffset: integer('end_offset').notNull(),
    overlapStart: integer('overlap_start').notNull(),
    parentId: text('parent_id'),
    metadata: jsonb('metadata').$type<ChunkMetadata>().notNull(),
    embedding: vector('embedding', { dimensions: EMBEDDING_DIMENSIONS }).notNull(),
    modelId: text('model_id').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('idx_transcript_chunks_source').on(table.sourceId, table.ordinal),
    index('idx_transcript_chunks_hnsw').using('hnsw', table.embedding.op('vector_cosine_ops')),
  ],
);

// ─── Table 2: parent_blocks ─────────────────────────────────────────────────
// Hierarchical retrieval: larger spans returned in place of their children.
export const parentBlocks = pgTable(
  'parent_blocks',
  {
    id: text('id').primaryKey(),
    sourceId: text('source_id').notNull(),
    ordinal: integer('ordinal').notNull(),
    text: text('text').notNull(),
    tokenCount: integer('token_count').notNull(),
    startOffset: integer('start_offset').notNull(),
    endOffset: integer('end_offset').notNull(),
    childIds: jsonb('child_ids').$type<string[]>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('idx_parent_blocks_source').on(table.sourceId),
  ],
);

// ─── Table 3: index_manifest ────────────────────────────────────────────────
// Single row recording which embedding model built the index. Vectors from
// different models live in different spaces and are never mixed.
export const indexManifest = pgTable('index_manifest', {
  id: text('id').primaryKey(),
  modelId: text('model_id').notNull(),
  dimensions: integer('dimensions').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});
