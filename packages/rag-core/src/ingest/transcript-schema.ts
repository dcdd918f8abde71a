/**
 * FILE PURPOSE: Validation for transcripts arriving from files or queue payloads
 * WHY: Both cross a JSON boundary; a malformed entry is rejected with the
 *      offending path instead of failing somewhere inside the chunker.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import type { Transcript } from '../types.js';

export const chunkMetadataSchema = z
  .object({
    videoId: z.string(),
    title: z.string(),
    url: z.string(),
    channel: z.string(),
    summary: z.string(),
    topics: z.array(z.string()),
  })
  .partial()
  .passthrough();

/** JSON shape of a transcript; `createdAt` is an ISO-8601 string. */
export const transcriptInputSchema = z.object({
  sourceId: z.string().min(1).describe('Video id or other stable source key'),
  text: z.string(),
  createdAt: z.string().datetime({ offset: true }).optional(),
  metadata: chunkMetadataSchema.default({}),
});

export const transcriptFileSchema = z.array(transcriptInputSchema);

export type TranscriptInput = z.infer<typeof transcriptInputSchema>;

export function toTranscript(input: TranscriptInput): Transcript {
  const transcript: Transcript = { sourceId: input.sourceId, text: input.text, metadata: input.metadata };
  if (input.createdAt) transcript.createdAt = new Date(input.createdAt);
  return transcript;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}

export function parseTranscriptInput(value: unknown): Transcript {
  const parsed = transcriptInputSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid transcript: ${describeIssues(parsed.error)}`);
  }
  return toTranscript(parsed.data);
}

export function parseTranscriptFile(value: unknown): Transcript[] {
  const parsed = transcriptFileSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid transcript file: ${describeIssues(parsed.error)}`);
  }
  return parsed.data.map(toTranscript);
}
