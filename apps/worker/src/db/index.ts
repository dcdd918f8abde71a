/**
 * FILE PURPOSE: Barrel export for database layer
 */

export { openDatabase } from './connection.js';
export type { Database, DatabaseHandle, DatabaseOptions } from './connection.js';
export {
  transcriptChunks,
  parentBlocks,
  indexManifest,
  EMBEDDING_DIMENSIONS,
  toVectorLiteral,
  parseVectorLiteral,
} from './schema.js';
