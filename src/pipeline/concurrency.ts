import { throwIfCancelled } from "../core/errors";

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Every slot
 * is allowed to settle before the first failure is rethrown, so no worker is
 * still running once this returns.
 */
export async function processWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  let index = 0;
  let failed = false;
  const slots = new Array(Math.max(1, Math.min(concurrency, items.length))).fill(null).map(async () => {
    while (!failed) {
      throwIfCancelled(signal);
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      try {
        await worker(items[current], current);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  });

  const results = await Promise.allSettled(slots);
  for (const result of results) {
    if (result.status === "rejected") {
      throw result.reason;
    }
  }
}
