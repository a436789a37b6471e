/**
 * Bounded exponential backoff for token endpoint calls.
 */

export interface RetryOptions {
  /** Total attempts including the first (default: 3) */
  attempts?: number;
  /** Delay before the second attempt, doubled each time (default: 200ms) */
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Run `operation` until it succeeds, `shouldRetry` says no, or attempts run out.
 * The last error is rethrown unchanged.
 */
export async function withBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  options: RetryOptions = {},
  label = 'operation'
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const baseDelayMs = options.baseDelayMs ?? 200;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = baseDelayMs * 2 ** (attempt - 1);
      console.warn(`[Retry] ${label} failed (attempt ${attempt}/${attempts}), retrying in ${delayMs}ms:`, error instanceof Error ? error.message : error);
      await sleep(delayMs);
    }
  }
}
