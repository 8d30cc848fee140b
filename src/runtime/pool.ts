import { availableParallelism } from 'os';

/**
 * Default bound on in-flight elements of a fan-out wave.
 */
export function defaultWorkerCount(): number {
  return Math.min(32, availableParallelism() + 4);
}

export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Run `worker` over every item with at most `limit` calls in flight.
 *
 * Every item runs to completion even after a failure; the settled results
 * come back in item order.
 *
 * Lanes are promises on one event loop, not threads. A worker that blocks
 * the thread (CPU-bound code with no `await`) holds every other lane until
 * it returns, so such workers run one at a time whatever the limit.
 */
export async function settleBounded<TItem, TResult>(
  items: readonly TItem[],
  limit: number,
  worker: (item: TItem, index: number) => Promise<TResult>
): Promise<Settled<TResult>[]> {
  const results: Settled<TResult>[] = new Array(items.length);
  const width = Math.max(1, Math.min(Math.floor(limit), items.length));
  let cursor = 0;

  const lane = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      try {
        results[index] = { ok: true, value: await worker(items[index], index) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    }
  };

  const lanes: Promise<void>[] = [];
  for (let i = 0; i < width; i++) {
    lanes.push(lane());
  }
  await Promise.all(lanes);
  return results;
}

/**
 * Like `settleBounded`, but resolves to the values in item order and
 * rethrows the first failure (by item index) once every item has settled.
 */
export async function runBounded<TItem, TResult>(
  items: readonly TItem[],
  limit: number,
  worker: (item: TItem, index: number) => Promise<TResult>
): Promise<TResult[]> {
  const settled = await settleBounded(items, limit, worker);
  const values: TResult[] = [];
  for (const result of settled) {
    if (!result.ok) {
      throw result.error;
    }
    values.push(result.value);
  }
  return values;
}
