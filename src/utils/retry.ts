import { AbortedError, sleep } from './timeout';

export interface BackoffPolicy {
  baseMs: number;
  multiplier: number;
  maxMs: number;
  jitterRatio: number;
}

export interface RetryOptions extends Partial<BackoffPolicy> {
  tries?: number;
  shouldRetry?: (error: unknown) => boolean;
  /** Minimum wait requested by the failed call, e.g. a rate-limit hint. */
  retryAfterMs?: (error: unknown) => number | undefined;
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  random?: () => number;
}

const DEFAULT_POLICY: BackoffPolicy = {
  baseMs: 500,
  multiplier: 2,
  maxMs: 8000,
  jitterRatio: 0.2,
};

/** Delay before retry number `retryIndex` (0-based), jittered by ±jitterRatio. */
export function computeBackoffDelay(
  retryIndex: number,
  policy: BackoffPolicy = DEFAULT_POLICY,
  random: () => number = Math.random
): number {
  const raw = Math.min(policy.maxMs, policy.baseMs * Math.pow(policy.multiplier, retryIndex));
  const jitter = (random() * 2 - 1) * policy.jitterRatio;
  return Math.max(0, Math.round(raw * (1 + jitter)));
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions
): Promise<T> {
  const tries = Math.max(1, opts?.tries ?? 3);
  const policy: BackoffPolicy = {
    baseMs: opts?.baseMs ?? DEFAULT_POLICY.baseMs,
    multiplier: opts?.multiplier ?? DEFAULT_POLICY.multiplier,
    maxMs: opts?.maxMs ?? DEFAULT_POLICY.maxMs,
    jitterRatio: opts?.jitterRatio ?? DEFAULT_POLICY.jitterRatio,
  };
  const shouldRetry = opts?.shouldRetry ?? (() => true);
  let lastErr: unknown;

  for (let attempt = 1; attempt <= tries; attempt++) {
    if (opts?.signal?.aborted) throw new AbortedError(opts.signal.reason);
    try {
      return await fn(attempt);
    } catch (e) {
      lastErr = e;
      if (attempt === tries || !shouldRetry(e) || opts?.signal?.aborted) {
        throw e;
      }
      const backoff = computeBackoffDelay(attempt - 1, policy, opts?.random);
      const floor = opts?.retryAfterMs?.(e);
      const delayMs = floor !== undefined ? Math.max(backoff, floor) : backoff;
      opts?.onRetry?.({ attempt, delayMs, error: e });
      await sleep(delayMs, opts?.signal);
    }
  }
  throw lastErr;
}
