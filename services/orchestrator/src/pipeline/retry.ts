import { setTimeout as sleep } from "node:timers/promises";

import { isRetriedInternally } from "../errors.js";

export interface RetryOptions {
  backoffMs: number;
  signal?: AbortSignal;
  onRetry?: (error: unknown) => void;
}

/**
 * Runs `operation`, and once more after `backoffMs` when the first failure
 * is of a kind the orchestrator retries. The second failure is final.
 */
export async function retryOnce<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (!isRetriedInternally(error) || options.signal?.aborted) {
      throw error;
    }
    options.onRetry?.(error);
    await sleep(options.backoffMs, undefined, { signal: options.signal });
    return operation();
  }
}
