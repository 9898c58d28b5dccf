import { TimeoutError } from '@core/errors.ts';
import { sleep } from './sleep.ts';

export interface WaitOptions {
  /** Deadline for the predicate to hold (ms) */
  timeoutMs: number;
  /** First polling interval (ms) */
  intervalMs?: number;
  /**
   * Interval multiplier after each miss
   * 1 = fixed interval, 2 = exponential backoff
   */
  backoff?: number;
  /** Upper bound for the polling interval (ms) */
  maxIntervalMs?: number;
  /** Used in the timeout message */
  description?: string;
  /** Errors thrown by the predicate that count as "not yet" instead of failing */
  ignore?: (error: Error) => boolean;
}

const expired = Symbol('expired');

/**
 * Settle with the attempt, or with `expired` once the remaining time runs out
 */
async function withinDeadline<T>(
  attempt: Promise<T>,
  remainingMs: number
): Promise<T | typeof expired> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<typeof expired>((resolve) => {
    timer = setTimeout(() => resolve(expired), Math.max(remainingMs, 0));
  });

  try {
    return await Promise.race([attempt, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Poll a predicate until it returns a value other than false/null/undefined
 *
 * Raises TimeoutError once the deadline passes, including while an attempt is
 * still pending; never retries after that. A stalled attempt is abandoned, not cancelled.
 *
 * @example
 * const box = await waitUntil(() => page.locator('#box0').isVisible(), { timeoutMs: 10_000 });
 */
export async function waitUntil<T>(
  predicate: () => T | false | null | undefined | Promise<T | false | null | undefined>,
  options: WaitOptions
): Promise<T> {
  const {
    timeoutMs,
    intervalMs = 250,
    backoff = 1,
    maxIntervalMs = 5000,
    description = 'condition',
    ignore,
  } = options;

  const deadline = Date.now() + timeoutMs;
  let interval = intervalMs;
  let attempts = 0;
  let lastError: Error | undefined;

  while (true) {
    attempts++;
    try {
      const value = await withinDeadline(
        Promise.resolve().then(predicate),
        deadline - Date.now()
      );
      if (value === expired) {
        break;
      }
      if (value !== false && value !== null && value !== undefined) {
        return value;
      }
    } catch (error) {
      const normalized = error instanceof Error ? error : new Error(String(error));
      if (!ignore?.(normalized)) {
        throw normalized;
      }
      lastError = normalized;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      break;
    }

    await sleep(Math.min(interval, remaining));
    interval = Math.min(interval * backoff, maxIntervalMs);
  }

  throw new TimeoutError(
    `Timed out after ${timeoutMs}ms waiting for ${description} (${attempts} attempts)`,
    timeoutMs,
    lastError ? { cause: lastError } : undefined
  );
}
