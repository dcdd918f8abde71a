/**
 * FILE PURPOSE: Barrel export for indexing queue processors
 */

export { processIndexTranscript } from './index-transcript.js';
export type { IndexingDeps, IndexTranscriptResult } from './index-transcript.js';

export { processRemoveTranscript } from './remove-transcript.js';
export type { RemoveTranscriptResult } from './remove-transcript.js';
