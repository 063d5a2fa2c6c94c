/**
 * Bounded concurrency for independent units of work.
 */
import { availableParallelism } from "node:os";

export type UnitResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Run fn over every item with at most `concurrency` units in flight.
 * A failing unit does not stop the others; results come back in input order
 * once every unit has settled.
 */
export async function mapSettled<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number = defaultConcurrency(),
): Promise<UnitResult<R>[]> {
  const results: UnitResult<R>[] = new Array(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { ok: true, value: await fn(items[index], index) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    }
  };

  const workers = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}
