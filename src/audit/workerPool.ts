export type PoolResult<R> = { started: true; value: R } | { started: false };

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Once `shouldStop()` returns
 * true, or a worker has thrown, no further item is started; items already running finish first.
 * The first error a worker threw is rethrown after every lane has settled.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  shouldStop: () => boolean = () => false
): Promise<Array<PoolResult<R>>> {
  const results: Array<PoolResult<R>> = items.map((): PoolResult<R> => ({ started: false }));
  let next = 0;
  let failed = false;

  const lane = async (): Promise<void> => {
    while (next < items.length && !failed && !shouldStop()) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      try {
        results[index] = { started: true, value: await worker(item, index) };
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  const width = Math.max(1, Math.min(concurrency, items.length));
  const settled = await Promise.allSettled(Array.from({ length: width }, () => lane()));
  const rejected = settled.find((s): s is PromiseRejectedResult => s.status === "rejected");
  if (rejected) throw rejected.reason;
  return results;
}
