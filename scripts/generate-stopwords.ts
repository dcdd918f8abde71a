#!/usr/bin/env npx tsx
/**
 * FILE PURPOSE: Propose filler words from a sample of transcripts
 *
 * WHY: data/fillers.txt is edited by hand. This writes candidates next to it
 *      for review; nothing is applied automatically.
 *
 * USAGE: npx tsx scripts/generate-stopwords.ts transcripts.json [out-path]
 *   default out-path: data/fillers.candidates.txt
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

async function main(): Promise<void> {
  const inputPath = process.argv[2];
  if (!inputPath) {
    throw new Error('Usage: npx tsx scripts/generate-stopwords.ts <transcripts.json> [out-path]');
  }
  const outPath = resolve(process.argv[3] ?? 'data/fillers.candidates.txt');

  const core = await import('../packages/rag-core/src/index.js');
  const transcripts = core.parseTranscriptFile(JSON.parse(readFileSync(resolve(inputPath), 'utf-8')));
  const existing = await core.loadFillerList(resolve('data/fillers.txt'));

  const report = core.generateStopwords(transcripts.map((t) => t.text));
  process.stdout.write(`Sampled ${transcripts.length} transcripts, ${report.totalTokens} words\n`);

  const fresh = report.stopwords.filter((w) => !existing.includes(w));
  const header = [
    `Candidates from ${transcripts.length} transcripts (${report.totalTokens} words).`,
    'Review before copying any entry into data/fillers.txt.',
  ].join('\n');
  writeFileSync(outPath, core.formatFillerList(fresh, header));

  process.stdout.write(`Wrote ${fresh.length} candidates not already in data/fillers.txt to ${outPath}\n`);
  process.stdout.write(`Top corpus additions: ${report.corpusAdditions.slice(0, 20).join(', ')}\n`);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`ERROR: ${message}\n`);
  process.exit(1);
});
