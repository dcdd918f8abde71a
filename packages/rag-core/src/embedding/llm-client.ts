/**
 * FILE PURPOSE: OpenAI-compatible client pointed at the LiteLLM proxy
 *
 * WHY: Embedding calls go through the proxy for cost tracking and provider
 *      fallbacks; nothing here talks to a provider directly.
 * HOW: Retries are owned by `withRetry` (see retry.ts), so the SDK's own retry
 *      loop is switched off and each attempt gets an explicit timeout.
 *
 * USAGE:
 *   const client = createLLMClient({ timeoutMs: 30_000 });
 *   const res = await client.embeddings.create({ model: 'text-embedding-3-small', input: ['...'] });
 */
import OpenAI from 'openai';

export interface LLMClientOptions {
  apiKey?: string;
  baseURL?: string;
  timeoutMs?: number;
  /** Extra default headers, e.g. trace forwarding. */
  headers?: Record<string, string>;
}

export function createLLMClient(options: LLMClientOptions = {}): OpenAI {
  const baseURL = options.baseURL || process.env.LITELLM_PROXY_URL || 'http://localhost:4000/v1';
  const apiKey = options.apiKey || process.env.LITELLM_API_KEY || '';

  return new OpenAI({
    baseURL,
    apiKey,
    maxRetries: 0,
    ...(options.timeoutMs ? { timeout: options.timeoutMs } : {}),
    ...(options.headers ? { defaultHeaders: options.headers } : {}),
  });
}

export type { OpenAI };
