/**
 * Bounded concurrency and per-unit deadlines for the pipeline passes.
 */

import { TimeoutError } from "./errors.js";

/** Result of one unit of work, success or failure */
export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Run `work` over every item with at most `concurrency` in flight.
 * A failing item never stops the others; results come back in item order.
 *
 * @throws {RangeError} If concurrency is not a positive integer
 *
 * @example
 * const results = await runPool(books, 4, (book) => ingestBook(book, deps));
 */
export async function runPool<I, R>(
  items: readonly I[],
  concurrency: number,
  work: (item: I, index: number) => Promise<R>,
): Promise<Settled<R>[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const results = new Array<Settled<R>>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { ok: true, value: await work(items[index], index) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Run `work` with a deadline. When it passes, the signal handed to `work` is
 * aborted and the returned promise rejects with a {@link TimeoutError},
 * whether or not `work` has noticed yet.
 *
 * @param label - Names the unit in the timeout message, e.g. "ingest book-1"
 */
export async function withDeadline<T>(
  timeoutMs: number,
  label: string,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
