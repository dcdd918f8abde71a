/**
 * FILE PURPOSE: Build the pgvector-backed pipeline from the environment
 * WHY: The worker process and the indexing script share one wiring so both
 *      write with the same model, fillers and chunk settings.
 */

import { fileURLToPath } from 'node:url';
import {
  createRagRuntime,
  loadFillerList,
  loadPipelineConfig,
  type RagRuntime,
} from '@transcript-rag/core';
import type { Database } from './db/connection.js';
import { PgVectorStore } from './store/pg-vector-store.js';

export const DEFAULT_FILLERS_PATH = fileURLToPath(new URL('../../../data/fillers.txt', import.meta.url));

export async function createPgRuntime(db: Database, env: NodeJS.ProcessEnv = process.env): Promise<RagRuntime> {
  const config = loadPipelineConfig(env);
  const fillers = await loadFillerList(env.FILLERS_PATH ?? DEFAULT_FILLERS_PATH);
  return createRagRuntime(config, { store: new PgVectorStore(db), fillers });
}
