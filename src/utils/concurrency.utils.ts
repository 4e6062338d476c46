/**
 * Progress callback: number of finished items and the total
 */
export type ProgressCallback = (completed: number, total: number) => void;

/**
 * Runs `fn` over every item with at most `concurrency` calls in flight.
 *
 * Spawns a fixed group of workers that pull from a shared queue and resolves
 * once every worker has found the queue empty, so no worker is ever stopped
 * in the middle of an item. A rejection from `fn` is handed to `onError` and
 * the worker moves on to the next item.
 */
export async function runWorkerPool<T>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T) => Promise<void>,
  options: {
    onProgress?: ProgressCallback;
    onError?: (item: T, error: unknown) => void;
  } = {}
): Promise<{ completed: number; failed: number }> {
  if (!Number.isFinite(concurrency) || concurrency < 1) {
    throw new RangeError(
      `Concurrency must be a finite number of at least 1, got ${concurrency}`
    );
  }

  const queue = [...items];
  const total = items.length;
  let completed = 0;
  let failed = 0;

  const workerCount = Math.min(Math.floor(concurrency), total);
  const workers: Array<Promise<void>> = [];

  for (let i = 0; i < workerCount; i++) {
    workers.push(
      (async () => {
        while (queue.length > 0) {
          const item = queue.shift();
          if (item === undefined) return;
          try {
            await fn(item);
          } catch (error) {
            failed++;
            options.onError?.(item, error);
          }
          completed++;
          options.onProgress?.(completed, total);
        }
      })()
    );
  }

  await Promise.all(workers);
  return { completed, failed };
}
