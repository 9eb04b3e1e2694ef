import { Logger, errorMessage } from "../observability";
import { CancelledError, HttpStatusError, throwIfCancelled } from "./errors";

export interface StepRetryPolicy {
  retries: number;
  delayMs: number;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function backoffDelay(baseMs: number, attempt: number, maxMs = 10_000): number {
  return Math.min(baseMs * 2 ** (attempt - 1), maxMs);
}

export function isRetryableStepError(error: unknown): boolean {
  if (error instanceof CancelledError) {
    return false;
  }
  if (error instanceof HttpStatusError) {
    return error.retryable;
  }
  return true;
}

/**
 * Re-executes a network-touching step the way a workflow scheduler would:
 * fixed delay between attempts, `policy.retries` extra attempts at most.
 */
export async function runStep<T>(
  name: string,
  policy: StepRetryPolicy,
  fn: () => Promise<T>,
  logger: Logger,
  signal?: AbortSignal,
): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    throwIfCancelled(signal);
    try {
      return await fn();
    } catch (error) {
      if (attempt > policy.retries || !isRetryableStepError(error)) {
        throw error;
      }
      logger.warn("step_retry", { step: name, attempt, error: errorMessage(error) });
      await sleep(policy.delayMs, signal);
    }
  }
}
