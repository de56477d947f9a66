/**
 * Worker Pool
 * Runs async tasks over a list with a bounded number in flight
 */

/**
 * Default pool size: one worker per item, capped, never below 1
 */
export function poolSize(itemCount: number, maxConcurrency: number): number {
  return Math.max(1, Math.min(itemCount, maxConcurrency));
}

/**
 * Run `worker` over `items` with at most `concurrency` calls pending.
 * Results are collected in completion order. A rejected worker rejects the whole run;
 * callers that need per-item outcomes fold failures into their result type.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  if (items.length === 0) {
    return results;
  }

  const size = poolSize(items.length, Math.floor(concurrency) || 1);
  let next = 0;

  const drain = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results.push(await worker(items[index], index));
    }
  };

  await Promise.all(Array.from({ length: size }, () => drain()));
  return results;
}
