/**
 * Process items in parallel with a concurrency limit
 *
 * Results keep the order of `items` regardless of completion order.
 * The first rejection is rethrown after every started task has settled.
 *
 * @example
 * ```typescript
 * const sizes = await parallelLimit(files, async (f) => (await stat(f)).size, 8);
 * ```
 */
export async function parallelLimit<T, R>(
  items: ReadonlyArray<T>,
  processor: (item: T) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  const limit = Math.max(1, Math.floor(concurrency));
  const results: R[] = new Array<R>(items.length);
  const executing = new Map<number, Promise<void>>();
  const failure: { error?: unknown; failed: boolean } = { failed: false };

  for (let i = 0; i < items.length; i++) {
    const index = i;
    const task = processor(items[i])
      .then((result) => {
        results[index] = result;
      })
      .catch((error: unknown) => {
        if (!failure.failed) {
          failure.failed = true;
          failure.error = error;
        }
      })
      .finally(() => {
        executing.delete(index);
      });

    executing.set(index, task);

    if (executing.size >= limit) {
      await Promise.race(executing.values());
    }
  }

  await Promise.all(executing.values());

  if (failure.failed) {
    throw failure.error;
  }

  return results;
}
