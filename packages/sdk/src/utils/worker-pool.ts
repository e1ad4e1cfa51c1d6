/**
 * Bounded worker pool: at most `concurrency` tasks in flight, each task's
 * failure captured for its own item.
 */

export type PoolResult<T, R> =
  | { item: T; ok: true; value: R }
  | { item: T; ok: false; error: Error }
  | { item: T; ok: false; cancelled: true };

export interface RunPoolOptions {
  /** Once aborted, no further task starts; remaining items are reported cancelled */
  signal?: AbortSignal;
}

export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, signal: AbortSignal | undefined) => Promise<R>,
  options: RunPoolOptions = {},
): Promise<Array<PoolResult<T, R>>> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const { signal } = options;
  const results = new Array<PoolResult<T, R>>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) break;

      if (signal?.aborted) {
        results[index] = { item, ok: false, cancelled: true };
        continue;
      }

      try {
        results[index] = { item, ok: true, value: await task(item, signal) };
      } catch (error) {
        results[index] = { item, ok: false, error: error instanceof Error ? error : new Error(String(error)) };
      }
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, items.length); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return results;
}
