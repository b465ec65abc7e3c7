/**
 * Bounded retry with exponential backoff.
 *
 * Each attempt resolves to an explicit AttemptOutcome instead of throwing, so
 * the loop never has to look at variables left over from a previous attempt.
 */

export type AttemptOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; transient: boolean; error: unknown; status?: number };

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number; last: Extract<AttemptOutcome<T>, { ok: false }> };

export interface RetryOptions {
  /** Total attempts including the first (>= 1) */
  maxAttempts: number;
  /** Delay before the second attempt; doubles after each further failure */
  baseDelayMs: number;
  /** Called before every attempt, 1-based */
  onAttempt?: (attempt: number) => void;
  /** Called when a transient failure is about to be retried */
  onRetry?: (attempt: number, outcome: Extract<AttemptOutcome<unknown>, { ok: false }>, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Delay before the attempt following `attempt` (1-based) */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Run `attempt` until it succeeds, fails non-transiently, or attempts run out.
 */
export async function withRetry<T>(
  attempt: (attemptNumber: number) => Promise<AttemptOutcome<T>>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const sleep = options.sleep ?? defaultSleep;

  for (let n = 1; ; n++) {
    options.onAttempt?.(n);
    const outcome = await attempt(n);

    if (outcome.ok) {
      return { ok: true, value: outcome.value, attempts: n };
    }
    if (!outcome.transient || n >= maxAttempts) {
      return { ok: false, attempts: n, last: outcome };
    }

    const delayMs = backoffDelay(options.baseDelayMs, n);
    options.onRetry?.(n, outcome, delayMs);
    if (delayMs > 0) {
      await sleep(delayMs);
    }
  }
}
