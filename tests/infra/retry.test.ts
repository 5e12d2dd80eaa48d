import { describe, expect, it } from 'vitest';
import { backoffDelay, withRetry } from '../../src/infra/retry.js';

describe('backoffDelay', () => {
  it('doubles up to the cap', () => {
    expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt, 2_000, 10_000))).toEqual([
      2_000, 4_000, 8_000, 10_000, 10_000,
    ]);
  });
});

describe('withRetry', () => {
  const options = { attempts: 3, baseDelayMs: 100, maxDelayMs: 1_000 };

  it('retries retryable errors until one attempt succeeds', async () => {
    const waits: number[] = [];
    const retries: number[] = [];
    const result = await withRetry(
      async (attempt) => {
        if (attempt < 3) throw new Error(`attempt ${attempt}`);
        return 'done';
      },
      {
        ...options,
        shouldRetry: () => true,
        sleep: async (ms) => {
          waits.push(ms);
        },
        onRetry: (_error, attempt) => retries.push(attempt),
      },
    );
    expect(result).toBe('done');
    expect(waits).toEqual([100, 200]);
    expect(retries).toEqual([1, 2]);
  });

  it('gives up after the last attempt', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new Error('still failing');
        },
        { ...options, shouldRetry: () => true, sleep: async () => undefined },
      ),
    ).rejects.toThrow('still failing');
    expect(calls).toBe(3);
  });

  it('rethrows at once when the error is not retryable', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new Error('forbidden');
        },
        { ...options, shouldRetry: () => false, sleep: async () => undefined },
      ),
    ).rejects.toThrow('forbidden');
    expect(calls).toBe(1);
  });
});
