import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { createLimiter, mapWithConcurrency } from '../src/embedding/concurrency.js';

describe('mapWithConcurrency', () => {
  it('preserves input order and bounds in-flight calls', async () => {
    let active = 0;
    let peak = 0;
    const results = await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await sleep(7 - n);
      active--;
      return n * 2;
    });

    expect(results).toEqual([2, 4, 6, 8, 10, 12]);
    expect(peak).toBe(2);
  });

  it('rejects when any call fails', async () => {
    await expect(
      mapWithConcurrency(['a', 'b', 'c'], 3, async (s) => {
        if (s === 'b') throw new Error('boom');
        return s;
      }),
    ).rejects.toThrow('boom');
  });

  it('handles an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async (n: number) => n)).toEqual([]);
  });
});

describe('createLimiter', () => {
  it('bounds in-flight calls across independent callers', async () => {
    const limit = createLimiter(2);
    let active = 0;
    let peak = 0;
    const task = async (n: number): Promise<number> => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
      return n;
    };

    const [first, second] = await Promise.all([
      Promise.all([1, 2, 3].map((n) => limit(() => task(n)))),
      Promise.all([4, 5, 6].map((n) => limit(() => task(n)))),
    ]);

    expect(first).toEqual([1, 2, 3]);
    expect(second).toEqual([4, 5, 6]);
    expect(peak).toBe(2);
  });

  it('frees the slot when a call fails', async () => {
    const limit = createLimiter(1);
    await expect(limit(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await limit(async () => 'next')).toBe('next');
  });
});
