/**
 * Progress details passed to `onItemComplete`.
 */
export interface PoolItemCompletion<R> {
  /** Value returned by `processFn` */
  result: R;
  /** Position of the item in the input array */
  index: number;
  /** Number of items finished so far, including this one */
  completedCount: number;
  /** Total number of items submitted */
  totalCount: number;
}

/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * Unlike batch processing where all items in a batch must complete before
 * the next batch starts, the pool keeps N workers active at all times.
 * When a worker finishes, it immediately picks up the next available item.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently using a worker pool pattern.
   *
   * Spawns up to `concurrency` workers that pull `(index, item)` pairs from a
   * shared cursor. Each result is written into a pre-sized array at its index,
   * so the output keeps the input order whatever the completion order.
   * `onItemComplete` runs on the coordinating side after each item; workers
   * never touch shared state beyond the cursor.
   *
   * @param items - Array of items to process
   * @param concurrency - Maximum number of concurrent workers (integer >= 1)
   * @param processFn - Async function to process each item
   * @param onItemComplete - Optional callback fired after each item completes
   * @returns Array of results in the same order as the input items
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (completion: PoolItemCompletion<R>) => void,
  ): Promise<R[]> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(
        `Concurrency must be a positive integer, received ${concurrency}`,
      );
    }

    const results: R[] = new Array(items.length);
    let nextIndex = 0;
    let completedCount = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length) {
        const index = nextIndex++;
        const result = await processFn(items[index], index);
        results[index] = result;
        completedCount++;
        onItemComplete?.({
          result,
          index,
          completedCount,
          totalCount: items.length,
        });
      }
    }

    const workers = Array.from(
      { length: Math.min(concurrency, items.length) },
      () => worker(),
    );
    await Promise.all(workers);
    return results;
  }
}
