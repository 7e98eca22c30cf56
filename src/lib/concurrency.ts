import { throwIfCancelled } from "./errors";

/**
 * Maps `items` through `fn` with at most `limit` calls in flight.
 * Results keep the input order. Stops pulling new items once the signal
 * aborts or any call rejects.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;
  let failed = false;

  async function worker() {
    while (!failed && next < items.length) {
      throwIfCancelled(signal);
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  }

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
