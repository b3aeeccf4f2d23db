export type TransportService = 'scraper' | 'llm';

export type TransportErrorKind =
  | 'timeout'
  | 'connection_failed'
  | 'rate_limited'
  | 'client_error'
  | 'server_error'
  | 'invalid_response';

const RETRYABLE_KINDS: ReadonlySet<TransportErrorKind> = new Set([
  'timeout',
  'connection_failed',
  'rate_limited',
  'server_error',
]);

export class TransportError extends Error {
  public readonly statusCode?: number;
  public readonly retryAfterMs?: number;
  public readonly attempt: number;

  constructor(
    public readonly kind: TransportErrorKind,
    public readonly service: TransportService,
    public readonly detail: string,
    options: { statusCode?: number; retryAfterMs?: number; attempt?: number; cause?: unknown } = {}
  ) {
    super(`${service} ${kind}: ${detail}`);
    this.name = 'TransportError';
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
    this.attempt = options.attempt ?? 1;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

export function isRetryableTransportError(error: unknown): boolean {
  return error instanceof TransportError && error.retryable;
}

export function transportRetryAfterMs(error: unknown): number | undefined {
  if (error instanceof TransportError && error.kind === 'rate_limited') {
    return error.retryAfterMs;
  }
  return undefined;
}

export function kindForStatus(status: number): TransportErrorKind {
  if (status === 429) return 'rate_limited';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'server_error';
  return 'client_error';
}

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfterMs(value: string | null | undefined, now = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000);
  const date = Date.parse(value);
  if (!Number.isFinite(date)) return undefined;
  return Math.max(0, date - now);
}

const CONNECTION_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ETIMEDOUT',
  'UND_ERR_SOCKET',
]);

export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? String(error.code) : '';
  if (CONNECTION_CODES.has(code)) return true;
  const message = error.message.toLowerCase();
  return message.includes('fetch failed') || message.includes('socket hang up');
}
