import { FleetError, isRetryable, toFleetError, type ErrorContext } from './errors.js';

export interface RetryPolicy {
  /** Retries after the first attempt; total attempts = maxRetries + 1. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryHooks {
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (err: FleetError, attempt: number, delayMs: number) => void;
}

/**
 * Delay before retry number `attempt` (1-based): base·2^(attempt-1), capped.
 * A provider hint raises the starting point and doubles along with it.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, hintMs = 0): number {
  const factor = 2 ** (attempt - 1);
  return Math.min(Math.max(policy.baseDelayMs, hintMs) * factor, policy.maxDelayMs);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new FleetError('cancelled', 'operation cancelled'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new FleetError('cancelled', 'operation cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn`, retrying transient failures (rate-limit, network, timeout) with
 * exponential backoff. Every other kind is thrown on first occurrence.
 * Errors always surface as FleetError carrying `context`.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  context: ErrorContext = {},
  hooks: RetryHooks = {},
): Promise<T> {
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    if (hooks.signal?.aborted) throw new FleetError('cancelled', 'operation cancelled', context);
    try {
      return await fn(attempt);
    } catch (err) {
      const fleetErr = toFleetError(err, context);
      const retriesUsed = attempt - 1;
      if (!isRetryable(fleetErr.kind) || retriesUsed >= policy.maxRetries) throw fleetErr;

      const delay = backoffDelay(policy, attempt, fleetErr.context.retryAfterMs);
      hooks.onRetry?.(fleetErr, attempt, delay);
      await wait(delay, hooks.signal);
    }
  }
}
