/**
 * FILE PURPOSE: Standalone BullMQ worker process for transcript indexing
 * WHY: Indexing runs apart from the chat API so embedding round-trips never
 *      block a request. Start via `npm run worker -w @transcript-rag/worker`.
 */

import * as Sentry from '@sentry/node';
import { createIndexingWorker } from '@transcript-rag/core';
import { openDatabase } from './db/index.js';
import { createPgRuntime } from './runtime.js';

// Sentry is a no-op when SENTRY_DSN is not set
const sentryDsn = process.env.SENTRY_DSN;
if (sentryDsn) {
  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.NODE_ENV ?? 'production',
    tracesSampleRate: 0.2,
    sendDefaultPii: false,
  });
}

const REDIS_URL = process.env.REDIS_URL;

if (!REDIS_URL) {
  process.stderr.write('FATAL: REDIS_URL is required to start the worker\n');
  process.exit(1);
}

const concurrency = Number(process.env.WORKER_CONCURRENCY) || 2;

const database = openDatabase();
const rag = await createPgRuntime(database.db);
await rag.indexer.assertCompatible();

const worker = createIndexingWorker(rag, REDIS_URL, concurrency);

worker.on('completed', (job) => {
  process.stderr.write(`INFO: Job ${job.id} (${job.data.type}) completed for ${job.data.sourceId}\n`);
});

worker.on('failed', (job, err) => {
  process.stderr.write(`ERROR: Job ${job?.id} (${job?.data.type}) failed: ${err.message}\n`);
  // Only the final failure is reported; earlier attempts are retried by BullMQ
  const finalAttempt = !job || job.attemptsMade >= (job.opts.attempts ?? 1);
  if (sentryDsn && finalAttempt) {
    Sentry.captureException(err, {
      tags: { queue: worker.name, jobType: job?.data.type ?? 'unknown' },
      extra: { jobId: job?.id, sourceId: job?.data.sourceId },
    });
  }
});

worker.on('error', (err) => {
  process.stderr.write(`ERROR: Worker error: ${err.message}\n`);
  if (sentryDsn) Sentry.captureException(err);
});

process.stderr.write(
  `INFO: Indexing worker started (concurrency=${concurrency}, model=${rag.embedder.modelId})\n`,
);

async function shutdown(): Promise<void> {
  process.stderr.write('INFO: Shutting down worker…\n');
  await worker.close();
  await database.close();
  if (sentryDsn) await Sentry.close(2000);
  process.exit(0);
}

function onSignal(): void {
  shutdown().catch((err: unknown) => {
    process.stderr.write(`ERROR: Shutdown failed: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  });
}

process.on('SIGTERM', onSignal);
process.on('SIGINT', onSignal);
