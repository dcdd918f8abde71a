/**
 * FILE PURPOSE: Bounded retry with backoff and a per-attempt timeout
 *
 * WHY: Embedding-API and store calls fail transiently (429s, resets, stuck
 *      sockets). A stuck call must time out and count as a retryable failure;
 *      after the last attempt the caller gets a TransientIOError.
 * HOW: Same backoff shape as the BullMQ job options: `{ type, delay }`.
 *      Non-transient errors (including ConfigurationError) are rethrown at once.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { AttemptTimeoutError, TransientIOError, isTransientError } from '../errors.js';

export interface BackoffOptions {
  type: 'exponential' | 'fixed';
  /** Base delay in ms. */
  delay: number;
}

export interface RetryOptions {
  attempts: number;
  backoff: BackoffOptions;
  timeoutMs?: number;
  /** Operation name used in log lines and the final error. */
  label?: string;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  attempts: 3,
  backoff: { type: 'exponential', delay: 1000 },
  timeoutMs: 30_000,
};

export function backoffDelay(backoff: BackoffOptions, attempt: number): number {
  return backoff.type === 'fixed' ? backoff.delay : backoff.delay * 2 ** (attempt - 1);
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function runWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
): Promise<T> {
  const controller = new AbortController();
  if (!timeoutMs) return fn(controller.signal);

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new AttemptTimeoutError(timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS,
): Promise<T> {
  const label = options.label ?? 'operation';
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await runWithTimeout(fn, options.timeoutMs);
    } catch (err) {
      if (!isTransientError(err)) throw err;
      lastError = err;
      if (attempt < attempts) {
        const delay = backoffDelay(options.backoff, attempt);
        process.stderr.write(
          `WARN: ${label} failed (attempt ${attempt}/${attempts}): ${describe(err)}; retrying in ${delay}ms\n`,
        );
        await sleep(delay);
      }
    }
  }

  throw new TransientIOError(`${label} failed after ${attempts} attempts: ${describe(lastError)}`, attempts, lastError);
}
