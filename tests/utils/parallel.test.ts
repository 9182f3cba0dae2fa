import { describe, it, expect } from 'vitest';
import { parallelLimit } from '../../src/utils/parallel.js';

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('parallelLimit', () => {
  it('should keep input order regardless of completion order', async () => {
    const results = await parallelLimit(
      [30, 10, 20],
      async ms => {
        await delay(ms);
        return ms * 2;
      },
      3
    );

    expect(results).toEqual([60, 20, 40]);
  });

  it('should never run more tasks than the limit', async () => {
    let running = 0;
    let peak = 0;

    await parallelLimit(
      Array.from({ length: 10 }, (_, i) => i),
      async () => {
        running++;
        peak = Math.max(peak, running);
        await delay(5);
        running--;
      },
      3
    );

    expect(peak).toBe(3);
  });

  it('should treat a limit below one as one', async () => {
    let running = 0;
    let peak = 0;

    await parallelLimit(
      [1, 2, 3],
      async () => {
        running++;
        peak = Math.max(peak, running);
        await delay(1);
        running--;
      },
      0
    );

    expect(peak).toBe(1);
  });

  it('should rethrow the first failure after started tasks settle', async () => {
    const finished: number[] = [];

    await expect(
      parallelLimit(
        [1, 2, 3],
        async n => {
          await delay(n * 5);
          if (n === 1) throw new Error('task 1 failed');
          finished.push(n);
          return n;
        },
        3
      )
    ).rejects.toThrow('task 1 failed');

    expect(finished).toEqual([2, 3]);
  });

  it('should return an empty array for no items', async () => {
    expect(await parallelLimit([], async () => 1, 4)).toEqual([]);
  });
});
