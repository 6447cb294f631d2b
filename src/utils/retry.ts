import { sleep } from "./sleep.js";

export interface RetryOptions {
  /** Attempts before giving up. `Infinity` retries until success or abort. */
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  jitter?: boolean;
  /** Which failures are worth another attempt. */
  retryIf: (error: Error) => boolean;
  /** Server-requested delay for an error, overriding the backoff. */
  retryAfterMs?: (error: Error) => number | null;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Aborting stops further attempts; the last error is rethrown. */
  signal?: AbortSignal;
}

export async function retry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 200,
    maxDelayMs = 10_000,
    backoffMultiplier = 2,
    jitter = true,
    retryIf,
    retryAfterMs,
    onRetry,
    signal,
  } = opts;

  let lastError: Error | null = null;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts - 1 || !retryIf(lastError) || signal?.aborted) {
        throw lastError;
      }

      const requested = retryAfterMs?.(lastError) ?? null;
      let delayMs: number;

      if (requested !== null) {
        delayMs = requested;
      } else {
        const exponential = initialDelayMs * Math.pow(backoffMultiplier, attempt);
        const capped = Math.min(exponential, maxDelayMs);
        const jitterMs = jitter ? Math.random() * capped * 0.3 : 0;
        delayMs = capped + jitterMs;
      }

      onRetry?.(attempt + 1, lastError, delayMs);
      await sleep(delayMs, signal);
      if (signal?.aborted) throw lastError;
    }
  }

  throw lastError ?? new Error("Retry exhausted");
}
