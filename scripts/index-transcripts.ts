#!/usr/bin/env npx tsx
/**
 * FILE PURPOSE: Batch-index transcripts from a JSON file
 *
 * WHY: Backfills and local experiments. Each transcript is chunked, embedded
 *      and swapped into the store; failures are reported per transcript.
 *
 * USAGE: npx tsx scripts/index-transcripts.ts transcripts.json
 *   ENQUEUE=true    hand each transcript to the indexing queue instead (needs REDIS_URL)
 *   DRY_RUN=true    index into an in-memory store and print what would be stored
 *
 * Input: [{ "sourceId": "abc123", "text": "...", "metadata": { "title": "..." } }, ...]
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { BatchIndexReport, VectorStoreStats } from '@transcript-rag/core';

function printReport(report: BatchIndexReport, stats: VectorStoreStats): void {
  process.stdout.write(
    `Indexed ${report.indexed.length}, skipped ${report.skipped.length}, failed ${report.failed.length}\n`,
  );
  for (const { sourceId, error } of report.failed) {
    process.stdout.write(`  failed ${sourceId}: ${error}\n`);
  }
  for (const sourceId of report.skipped) {
    process.stdout.write(`  skipped ${sourceId}: empty after normalization\n`);
  }
  process.stdout.write(
    `Store: model=${stats.modelId ?? '(empty)'} chunks=${stats.chunkCount} parents=${stats.parentCount} sources=${stats.sources.length}\n`,
  );
  for (const { sourceId, chunkCount } of stats.sources) {
    process.stdout.write(`  ${sourceId}: ${chunkCount} chunks\n`);
  }
}

async function main(): Promise<void> {
  const inputPath = process.argv[2];
  if (!inputPath) {
    throw new Error('Usage: npx tsx scripts/index-transcripts.ts <transcripts.json>');
  }

  const core = await import('../packages/rag-core/src/index.js');
  const transcripts = core.parseTranscriptFile(JSON.parse(readFileSync(resolve(inputPath), 'utf-8')));
  process.stdout.write(`Loaded ${transcripts.length} transcripts from ${inputPath}\n`);

  if (process.env.ENQUEUE === 'true') {
    const queue = core.createIndexingQueue(process.env.REDIS_URL);
    try {
      for (const transcript of transcripts) {
        const jobId = await core.enqueueIndexTranscript(queue, transcript);
        process.stdout.write(`Enqueued ${transcript.sourceId} (job ${jobId ?? '?'})\n`);
      }
    } finally {
      await queue.close();
    }
    return;
  }

  const concurrency = Number(process.env.BATCH_CONCURRENCY) || 2;

  if (process.env.DRY_RUN === 'true') {
    const config = core.loadPipelineConfig();
    const fillers = await core.loadFillerList(resolve('data/fillers.txt'));
    const rag = core.createRagRuntime(config, { store: new core.InMemoryVectorStore(), fillers });
    const report = await core.indexTranscripts(transcripts, { ...rag, concurrency });
    printReport(report, await rag.store.stats());
    return;
  }

  // Dynamic import: no pool is opened when only enqueueing
  const { openDatabase } = await import('../apps/worker/src/db/index.js');
  const { createPgRuntime } = await import('../apps/worker/src/runtime.js');
  const database = openDatabase();
  try {
    const rag = await createPgRuntime(database.db);
    const report = await core.indexTranscripts(transcripts, { ...rag, concurrency });
    printReport(report, await rag.store.stats());
    if (report.failed.length > 0) process.exitCode = 1;
  } finally {
    await database.close();
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`ERROR: ${message}\n`);
  process.exit(1);
});
