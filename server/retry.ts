import { errorMessage } from "./errors";
import { log } from "./log";

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  jitterFactor?: number;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (error: unknown) => boolean;
  label?: string;
}

/**
 * Exponential backoff with jitter: base * 2^attempt, capped, then scaled by a
 * random factor in [1 - jitter, 1 + jitter].
 */
export function calculateBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs = 30_000,
  jitterFactor = 0.2
): number {
  const capped = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
  const jitter = 1 + (Math.random() * 2 - 1) * jitterFactor;
  return Math.max(0, Math.round(capped * jitter));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Run `fn`, retrying up to `retries` more times. The last error is rethrown. */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable || attempt >= options.retries) throw error;

      const delay = calculateBackoffDelay(
        attempt,
        options.baseDelayMs,
        options.maxDelayMs,
        options.jitterFactor
      );
      log.warn(
        `${options.label ?? "Operation"} failed (attempt ${attempt + 1}/${options.retries + 1}): ${errorMessage(error)}. Retrying in ${delay}ms`
      );
      await sleep(delay);
      attempt++;
    }
  }
}

export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Map over items with at most `concurrency` calls in flight. Results keep
 * input order; a rejection is captured per item instead of failing the pool.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<Settled<R>[]> {
  const results: Settled<R>[] = new Array(items.length);
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

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}
