export interface SettledItem<I, R> {
  readonly item: I;
  readonly outcome: PromiseSettledResult<R>;
}

export interface WorkerPoolOptions<I, R> {
  /** Workers pulling from the shared queue; at least one. */
  concurrency: number;
  /** Items not yet started when this aborts are rejected with its reason. */
  signal?: AbortSignal;
  onSettled?: (settled: SettledItem<I, R>, completed: number, total: number) => void;
}

/**
 * Maps every item through `worker` with a fixed number of workers draining
 * one queue. Results keep item order; a failing item never stops the others.
 */
export async function mapSettled<I, R>(
  items: readonly I[],
  worker: (item: I) => Promise<R>,
  options: WorkerPoolOptions<I, R>
): Promise<SettledItem<I, R>[]> {
  const results: SettledItem<I, R>[] = [];
  const queue = items.entries();
  const total = items.length;
  let completed = 0;

  const settle = (index: number, settled: SettledItem<I, R>): void => {
    results[index] = settled;
    completed += 1;
    options.onSettled?.(settled, completed, total);
  };

  const drain = async (): Promise<void> => {
    for (const [index, item] of queue) {
      if (options.signal?.aborted) {
        settle(index, {
          item,
          outcome: { status: 'rejected', reason: options.signal.reason },
        });
        continue;
      }
      let outcome: PromiseSettledResult<R>;
      try {
        outcome = { status: 'fulfilled', value: await worker(item) };
      } catch (error) {
        outcome = { status: 'rejected', reason: error };
      }
      settle(index, { item, outcome });
    }
  };

  const limit = Number.isFinite(options.concurrency)
    ? Math.max(1, Math.floor(options.concurrency))
    : 1;
  const workers = Math.min(limit, total);
  await Promise.all(Array.from({ length: workers }, drain));
  return results;
}
