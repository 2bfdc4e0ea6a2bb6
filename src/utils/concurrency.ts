import { RunCancelledError } from "../domain/errors.js";

/**
 * Maps items with at most `concurrency` mappers in flight. Results keep input order.
 *
 * When `signal` aborts, no further items are started; in-flight mappers are awaited
 * and a RunCancelledError is thrown instead of a partial result array.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  mapper: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  if (!Number.isFinite(concurrency) || concurrency <= 0) {
    throw new Error("Concurrency must be a positive number.");
  }

  if (items.length === 0) {
    return [];
  }

  const results = new Array<R>(items.length);
  const workerCount = Math.min(Math.floor(concurrency), items.length);
  let cursor = 0;
  let settledCount = 0;

  const workers = Array.from({ length: workerCount }, async () => {
    while (cursor < items.length && !signal?.aborted) {
      const currentIndex = cursor;
      cursor += 1;
      results[currentIndex] = await mapper(items[currentIndex], currentIndex);
      settledCount += 1;
    }
  });

  const settled = await Promise.allSettled(workers);

  if (signal?.aborted) {
    throw new RunCancelledError(settledCount);
  }

  for (const worker of settled) {
    if (worker.status === "rejected") {
      throw worker.reason;
    }
  }

  return results;
}
