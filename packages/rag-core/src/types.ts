/**
 * FILE PURPOSE: Core data model — transcripts, chunks, parent blocks, embedding records
 *
 * WHY: Every stage passes these shapes by value. Parent linkage is a lookup key,
 *      never an object reference, so re-chunking a transcript stays cheap.
 */

/** Metadata bag carried unmodified from a transcript onto each of its chunks. */
export interface ChunkMetadata {
  videoId?: string;
  title?: string;
  url?: string;
  channel?: string;
  summary?: string;
  topics?: string[];
  [key: string]: unknown;
}

export interface Transcript {
  sourceId: string;
  text: string;
  createdAt?: Date;
  metadata: ChunkMetadata;
}

/** Splitter/refiner output: a span of the normalized text, no overlap yet. */
export interface RawChunk {
  text: string;
  start: number;
  end: number;
  tokenStart: number;
  tokenEnd: number;
  tokenCount: number;
}

export interface Chunk {
  /** `<sourceId>:<ordinal>` */
  id: string;
  sourceId: string;
  ordinal: number;
  /** Stored text: overlap from the previous chunk followed by the chunk's own span. */
  text: string;
  /** Tokens in the own span; size bounds apply to this count. */
  tokenCount: number;
  overlapTokenCount: number;
  /** Own span `[start, end)` in the normalized transcript. */
  start: number;
  end: number;
  /** Where `text` begins in the normalized transcript (`<= start`). */
  overlapStart: number;
  parentId?: string;
  metadata: ChunkMetadata;
}

export interface ParentBlock {
  /** `<sourceId>:parent:<ordinal>` */
  id: string;
  sourceId: string;
  ordinal: number;
  text: string;
  tokenCount: number;
  start: number;
  end: number;
  childIds: string[];
}

export interface ChunkedTranscript {
  sourceId: string;
  normalizedText: string;
  chunks: Chunk[];
  parents: ParentBlock[];
}

export interface EmbeddingRecord {
  chunkId: string;
  sourceId: string;
  vector: number[];
  modelId: string;
  chunk: Chunk;
}

export function chunkId(sourceId: string, ordinal: number): string {
  return `${sourceId}:${ordinal}`;
}

export function parentId(sourceId: string, ordinal: number): string {
  return `${sourceId}:parent:${ordinal}`;
}

/** Id prefix shared by every chunk and parent block of a transcript. */
export function sourcePrefix(sourceId: string): string {
  return `${sourceId}:`;
}

/** The chunk's own text without the overlap prepended from its predecessor. */
export function ownText(chunk: Chunk): string {
  return chunk.text.slice(chunk.start - chunk.overlapStart);
}
