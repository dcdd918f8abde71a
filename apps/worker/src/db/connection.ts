/**
 * FILE PURPOSE: Open the pgvector database used by the worker and the batch script
 *
 * HOW: postgres.js pool wrapped in Drizzle ORM, opened on demand rather than at
 *      import so the dry-run and enqueue paths never touch Postgres. The pool
 *      size follows DB_POOL_MAX; pg writes run one transaction per transcript,
 *      so it should be at least BATCH_CONCURRENCY (or WORKER_CONCURRENCY).
 */

import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { ConfigurationError } from '@transcript-rag/core';
import * as schema from './schema.js';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseOptions {
  /** Defaults to DATABASE_URL. */
  url?: string;
  /** Defaults to DB_POOL_MAX, else 10. */
  maxConnections?: number;
}

export interface DatabaseHandle {
  db: Database;
  /** Drain the pool; failures are logged, not thrown, so shutdown can finish. */
  close(): Promise<void>;
}

const DEFAULT_POOL_MAX = 10;

function poolSize(options: DatabaseOptions, env: NodeJS.ProcessEnv): number {
  const raw = options.maxConnections ?? (env.DB_POOL_MAX ? Number(env.DB_POOL_MAX) : DEFAULT_POOL_MAX);
  if (!Number.isInteger(raw) || raw < 1) {
    throw new ConfigurationError(`DB_POOL_MAX must be a positive integer, got ${String(raw)}`);
  }
  return raw;
}

export function openDatabase(options: DatabaseOptions = {}, env: NodeJS.ProcessEnv = process.env): DatabaseHandle {
  const url = options.url ?? env.DATABASE_URL;
  if (!url) {
    throw new ConfigurationError('DATABASE_URL is required to use the pgvector store');
  }

  const client = postgres(url, {
    max: poolSize(options, env),
    idle_timeout: 20,
    connect_timeout: 10,
  });

  return {
    db: drizzle(client, { schema }),
    async close(): Promise<void> {
      try {
        await client.end({ timeout: 5 });
      } catch (err) {
        process.stderr.write(
          `WARN: Error closing database connection: ${err instanceof Error ? err.message : String(err)}\n`,
        );
      }
    },
  };
}
