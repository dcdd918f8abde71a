/**
 * FILE PURPOSE: Bounded-concurrency helpers: a worker pool over an array, and a
 *               shared limiter for calls that arrive from many callers
 * WHY: Embedding many batches at once trips upstream rate limits.
 */

export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const queue = items.map((item, index) => ({ item, index }));
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed) {
      const entry = queue[next++];
      if (!entry) return;
      try {
        results[entry.index] = await fn(entry.item, entry.index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  const size = Math.max(1, Math.min(limit, queue.length));
  await Promise.all(Array.from({ length: size }, () => worker()));
  return results;
}

/** Runs `fn` once a slot is free; at most `limit` calls are in flight across all callers. */
export type Limiter = <T>(fn: () => Promise<T>) => Promise<T>;

export function createLimiter(limit: number): Limiter {
  const max = Math.max(1, limit);
  const waiting: Array<() => void> = [];
  let active = 0;

  return async <T>(fn: () => Promise<T>): Promise<T> => {
    if (active < max) active++;
    else await new Promise<void>((resolve) => waiting.push(resolve));
    try {
      return await fn();
    } finally {
      // Hand the slot straight to the next waiter
      const next = waiting.shift();
      if (next) next();
      else active--;
    }
  };
}
