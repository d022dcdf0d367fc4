// src/concurrency.ts

/**
 * Runs `runner` over `items` with at most `concurrency` calls in flight.
 * Results keep the index of their item. Items not yet started when `signal` aborts
 * are never run and their slots stay undefined.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  runner: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array(items.length).fill(undefined);
  if (items.length === 0) return results;

  // Anything below one, or not a number, runs sequentially
  const limit = Math.max(1, Math.trunc(concurrency) || 1);
  let next = 0;
  const workers = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (next < items.length && !signal?.aborted) {
      const current = next;
      next += 1;
      results[current] = await runner(items[current], current);
    }
  });

  await Promise.all(workers);
  return results;
}
