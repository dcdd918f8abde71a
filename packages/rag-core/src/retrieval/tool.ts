/**
 * FILE PURPOSE: Retrieval exposed as an agent tool
 * WHY: The chat agent decides when to look things up. The tool hides retriever
 *      and assembler wiring behind one `run(query)` call returning prompt-ready context.
 */

import { ConfigurationError } from '../errors.js';
import { assembleContext, type ContextWindow } from './assembler.js';
import type { Retriever } from './retriever.js';

export interface RetrievalTool {
  name: string;
  description: string;
  run(query: string): Promise<ContextWindow>;
}

export interface RetrievalToolOptions {
  topK: number;
  tokenBudget: number;
  name?: string;
  description?: string;
}

const DEFAULT_DESCRIPTION =
  'Search indexed video transcripts for passages relevant to the query. '
  + 'Returns transcript excerpts, each headed by the video it came from.';

export function createRetrievalTool(retriever: Retriever, options: RetrievalToolOptions): RetrievalTool {
  const { topK, tokenBudget } = options;
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ConfigurationError(`topK must be a positive integer, got ${topK}`);
  }
  if (!Number.isInteger(tokenBudget) || tokenBudget < 0) {
    throw new ConfigurationError(`Context token budget must be a non-negative integer, got ${tokenBudget}`);
  }

  return {
    name: options.name ?? 'search_transcripts',
    description: options.description ?? DEFAULT_DESCRIPTION,
    async run(query: string): Promise<ContextWindow> {
      const result = await retriever.retrieve(query, topK);
      return assembleContext(result, tokenBudget);
    },
  };
}
