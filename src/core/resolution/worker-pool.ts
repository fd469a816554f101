import { CancelledError } from '../../utils/errors.js';

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 *
 * Results keep the input order regardless of completion order. The first
 * rejection stops idle workers from picking up new items and is rethrown once
 * the in-flight calls settle, so nothing keeps running after the pool returns.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results = new Array<R>(items.length);
  let next = 0;
  const state: { failure?: { error: unknown } } = {};

  const runWorker = async (): Promise<void> => {
    while (!state.failure && next < items.length) {
      if (signal?.aborted) {
        state.failure = { error: new CancelledError() };
        return;
      }
      const index = next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => runWorker()));

  if (state.failure) {
    throw state.failure.error;
  }
  return results;
}
