export type PoolResult<R> = {
  index: number;
  value: R;
};

export type PoolOutcome<R> = {
  results: PoolResult<R>[];
  dispatched: number;
  cancelled: boolean;
};

export type PoolOptions<R> = {
  signal?: AbortSignal;
  onSettled?: (result: PoolResult<R>, settled: number) => void;
};

/**
 * Runs `runner` over `items` with at most `concurrency` calls in flight.
 * An aborted signal stops dispatching; work already started is awaited.
 * The first failure also stops dispatching and is rethrown once the other
 * workers have drained.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  runner: (item: T, index: number) => Promise<R>,
  options: PoolOptions<R> = {}
): Promise<PoolOutcome<R>> {
  const { signal, onSettled } = options;
  const results: PoolResult<R>[] = [];
  if (items.length === 0) return { results, dispatched: 0, cancelled: Boolean(signal?.aborted) };

  const limit = Math.max(1, Math.trunc(concurrency));
  let next = 0;
  let failed = false;

  const workers = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (next < items.length && !failed && !signal?.aborted) {
      const current = next;
      next += 1;
      try {
        const value = await runner(items[current], current);
        const result = { index: current, value };
        results.push(result);
        onSettled?.(result, results.length);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  });

  const settled = await Promise.allSettled(workers);
  const rejection = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === "rejected");
  if (rejection) throw rejection.reason;

  results.sort((a, b) => a.index - b.index);
  return {
    results,
    dispatched: next,
    cancelled: next < items.length
  };
}
