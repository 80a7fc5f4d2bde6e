export interface ConcurrencyOptions<TItem, TResult> {
  items: readonly TItem[];

  /** Lanes running at once. Values below 1 mean 1. */
  concurrency: number;
  worker: (item: TItem, index: number) => Promise<TResult>;
  onProgress?: (info: { completed: number; total: number }) => void;
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 *
 * Lanes pull from one shared iterator, so a slow item never holds back the
 * rest. Results keep the input order.
 */
export async function runWithConcurrency<TItem, TResult>(
  options: ConcurrencyOptions<TItem, TResult>,
): Promise<TResult[]> {
  const { items, worker, onProgress } = options;
  const results = new Array<TResult>(items.length);
  const pending = items.entries();
  let completed = 0;

  const lane = async (): Promise<void> => {
    for (const [index, item] of pending) {
      results[index] = await worker(item, index);
      completed += 1;
      onProgress?.({ completed, total: items.length });
    }
  };

  const lanes = Math.min(Math.max(1, Math.floor(options.concurrency) || 1), items.length);
  await Promise.all(Array.from({ length: lanes }, lane));
  return results;
}
