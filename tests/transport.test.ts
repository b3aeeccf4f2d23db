import { describe, it, expect } from '@jest/globals';
import {
  TransportError,
  isConnectionError,
  isRetryableTransportError,
  kindForStatus,
  parseRetryAfterMs,
  transportRetryAfterMs,
} from '../src/utils/transport';

describe('kindForStatus', () => {
  it('maps HTTP statuses to error kinds', () => {
    expect(kindForStatus(429)).toBe('rate_limited');
    expect(kindForStatus(408)).toBe('timeout');
    expect(kindForStatus(500)).toBe('server_error');
    expect(kindForStatus(503)).toBe('server_error');
    expect(kindForStatus(404)).toBe('client_error');
  });
});

describe('TransportError', () => {
  it('marks only transient kinds as retryable', () => {
    expect(new TransportError('timeout', 'llm', 'x').retryable).toBe(true);
    expect(new TransportError('connection_failed', 'scraper', 'x').retryable).toBe(true);
    expect(new TransportError('client_error', 'llm', 'x').retryable).toBe(false);
    expect(new TransportError('invalid_response', 'scraper', 'x').retryable).toBe(false);
    expect(isRetryableTransportError(new Error('plain'))).toBe(false);
  });

  it('exposes the retry hint only for rate limiting', () => {
    expect(transportRetryAfterMs(new TransportError('rate_limited', 'llm', 'x', { retryAfterMs: 900 }))).toBe(900);
    expect(transportRetryAfterMs(new TransportError('server_error', 'llm', 'x', { retryAfterMs: 900 }))).toBeUndefined();
  });
});

describe('parseRetryAfterMs', () => {
  it('reads delta seconds', () => {
    expect(parseRetryAfterMs('120')).toBe(120000);
    expect(parseRetryAfterMs('0.5')).toBe(500);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2015 07:28:00 GMT');
    expect(parseRetryAfterMs('Wed, 21 Oct 2015 07:28:30 GMT', now)).toBe(30000);
    expect(parseRetryAfterMs('Wed, 21 Oct 2015 07:27:00 GMT', now)).toBe(0);
  });

  it('ignores missing or unreadable values', () => {
    expect(parseRetryAfterMs(null)).toBeUndefined();
    expect(parseRetryAfterMs('soon')).toBeUndefined();
  });
});

describe('isConnectionError', () => {
  it('recognises socket error codes and fetch failures', () => {
    expect(isConnectionError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe(true);
    expect(isConnectionError(new TypeError('fetch failed'))).toBe(true);
    expect(isConnectionError(new Error('invalid JSON'))).toBe(false);
    expect(isConnectionError('ECONNRESET')).toBe(false);
  });
});
