import { describe, it, expect, jest } from '@jest/globals';
import { computeBackoffDelay, withRetry } from '../src/utils/retry';
import { TransportError, isRetryableTransportError, transportRetryAfterMs } from '../src/utils/transport';
import { AbortedError } from '../src/utils/timeout';

const policy = { baseMs: 500, multiplier: 2, maxMs: 8000, jitterRatio: 0.2 };

describe('computeBackoffDelay', () => {
  it('doubles the delay without jitter at the midpoint', () => {
    const mid = () => 0.5;
    expect(computeBackoffDelay(0, policy, mid)).toBe(500);
    expect(computeBackoffDelay(1, policy, mid)).toBe(1000);
    expect(computeBackoffDelay(2, policy, mid)).toBe(2000);
  });

  it('caps the delay at maxMs', () => {
    expect(computeBackoffDelay(10, policy, () => 0.5)).toBe(8000);
  });

  it('applies jitter within the ratio', () => {
    expect(computeBackoffDelay(0, policy, () => 0)).toBe(400);
    expect(computeBackoffDelay(0, policy, () => 1)).toBe(600);
  });
});

describe('withRetry', () => {
  const fast = { baseMs: 1, maxMs: 5, random: () => 0.5 };

  it('returns the first successful result', async () => {
    const fn = jest.fn(async (_attempt: number) => 'ok');
    await expect(withRetry(fn, fast)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries until success and reports each wait', async () => {
    const delays: number[] = [];
    let calls = 0;

    const result = await withRetry(
      async (attempt) => {
        calls++;
        if (attempt < 3) throw new TransportError('server_error', 'llm', 'status 500');
        return attempt;
      },
      { ...fast, tries: 3, onRetry: ({ delayMs }) => delays.push(delayMs) }
    );

    expect(result).toBe(3);
    expect(calls).toBe(3);
    expect(delays).toEqual([1, 2]);
  });

  it('gives up after the configured number of tries', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error(`failure ${calls}`);
        },
        { ...fast, tries: 2 }
      )
    ).rejects.toThrow('failure 2');
    expect(calls).toBe(2);
  });

  it('does not retry errors the predicate rejects', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new TransportError('client_error', 'scraper', 'status 400', { statusCode: 400 });
        },
        { ...fast, shouldRetry: isRetryableTransportError }
      )
    ).rejects.toThrow('scraper client_error: status 400');
    expect(calls).toBe(1);
  });

  it('waits at least the retry-after hint', async () => {
    const delays: number[] = [];
    let calls = 0;

    await withRetry(
      async () => {
        calls++;
        if (calls === 1) {
          throw new TransportError('rate_limited', 'llm', 'status 429', { statusCode: 429, retryAfterMs: 20 });
        }
        return 'done';
      },
      {
        ...fast,
        shouldRetry: isRetryableTransportError,
        retryAfterMs: transportRetryAfterMs,
        onRetry: ({ delayMs }) => delays.push(delayMs),
      }
    );

    expect(delays).toEqual([20]);
  });

  it('stops waiting when the signal aborts', async () => {
    const controller = new AbortController();
    let calls = 0;

    const pending = withRetry(
      async () => {
        calls++;
        throw new TransportError('timeout', 'llm', 'no response');
      },
      { baseMs: 10_000, maxMs: 10_000, random: () => 0.5, signal: controller.signal }
    );
    setTimeout(() => controller.abort(new Error('deadline')), 5);

    await expect(pending).rejects.toBeInstanceOf(AbortedError);
    expect(calls).toBe(1);
  });
});
