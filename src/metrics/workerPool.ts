// Runs `worker` over `items` with at most `concurrency` calls in flight.
// Workers stop taking new items once `signal` is aborted; items never started are left untouched.
export async function runWorkerPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let next = 0;

  async function drain(): Promise<void> {
    while (next < items.length && !signal?.aborted) {
      const item = items[next++];
      if (item === undefined) continue;
      await worker(item);
    }
  }

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => drain()));
}
