/**
 * Bounded worker pool: at most `concurrency` workers run at once.
 * Results come back in input order regardless of completion order.
 */

export interface WorkerPoolOptions {
  concurrency: number;
  /** Once aborted, no new item is started; running ones finish. */
  signal?: AbortSignal;
}

export type PoolResult<R> = { started: true; value: R } | { started: false };

export async function runWithConcurrency<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: WorkerPoolOptions,
): Promise<PoolResult<R>[]> {
  const { concurrency, signal } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results: PoolResult<R>[] = items.map(() => ({ started: false }));
  let next = 0;

  async function drain(): Promise<void> {
    while (next < items.length) {
      if (signal?.aborted) return;
      const index = next++;
      results[index] = { started: true, value: await worker(items[index], index) };
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => drain());
  await Promise.all(workers);
  return results;
}
