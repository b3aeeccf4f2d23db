import fetch from 'node-fetch';
import type { RetrySettings } from '../../config/settings';
import type { PaperRecord } from '../../pipeline/types';
import { LaneLimiter } from '../../utils/limiter';
import { createConsoleLogger, type Logger } from '../../utils/logger';
import { withRetry } from '../../utils/retry';
import { AbortedError, attemptScope } from '../../utils/timeout';
import {
  TransportError,
  isRetryableTransportError,
  kindForStatus,
  parseRetryAfterMs,
  transportRetryAfterMs,
} from '../../utils/transport';
import { normalizeScraperResponse } from './normalize';

export interface FetchPapersOptions {
  signal?: AbortSignal;
}

export interface PaperSource {
  fetchPapers(query: string, maxResults: number, options?: FetchPapersOptions): Promise<PaperRecord[]>;
}

export interface ScraperClientConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  retry: RetrySettings;
}

const HEALTH_TIMEOUT_MS = 5000;

export class ScraperClient implements PaperSource {
  constructor(
    private config: ScraperClientConfig,
    private logger: Logger = createConsoleLogger('ScraperClient'),
    private limiter: LaneLimiter = new LaneLimiter()
  ) {}

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) h['x-api-key'] = this.config.apiKey;
    return h;
  }

  async fetchPapers(
    query: string,
    maxResults: number,
    options: FetchPapersOptions = {}
  ): Promise<PaperRecord[]> {
    this.logger.info('Requesting papers from scraper', { query, maxResults });

    const papers = await withRetry(
      (attempt) => this.limiter.limit('scraper', () => this.attempt(query, maxResults, attempt, options.signal)),
      {
        tries: this.config.retry.maxAttempts,
        baseMs: this.config.retry.baseDelayMs,
        maxMs: this.config.retry.maxDelayMs,
        multiplier: this.config.retry.multiplier,
        jitterRatio: this.config.retry.jitterRatio,
        shouldRetry: isRetryableTransportError,
        retryAfterMs: transportRetryAfterMs,
        signal: options.signal,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn(`Scraper attempt ${attempt} failed, retrying in ${delayMs}ms`, {
            error: error instanceof Error ? error.message : String(error),
          });
        },
      }
    );

    this.logger.info(`Received ${papers.length} papers from scraper`);
    return papers;
  }

  async healthCheck(): Promise<boolean> {
    const scope = attemptScope(HEALTH_TIMEOUT_MS);
    try {
      const res = await fetch(`${this.config.baseUrl}/health`, {
        headers: this.headers(),
        signal: scope.signal,
      });
      return res.ok;
    } catch (error) {
      this.logger.warn('Scraper health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    } finally {
      scope.dispose();
    }
  }

  private async attempt(
    query: string,
    maxResults: number,
    attempt: number,
    upstream?: AbortSignal
  ): Promise<PaperRecord[]> {
    if (upstream?.aborted) throw new AbortedError(upstream.reason);
    const scope = attemptScope(this.config.timeoutMs, upstream);

    try {
      const res = await fetch(`${this.config.baseUrl}/scrape`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({ query, max_results: maxResults }),
        signal: scope.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new TransportError(kindForStatus(res.status), 'scraper', `status ${res.status} ${body.slice(0, 200)}`.trim(), {
          statusCode: res.status,
          retryAfterMs: parseRetryAfterMs(res.headers.get('retry-after')),
          attempt,
        });
      }

      let json: unknown;
      try {
        json = await res.json();
      } catch (error) {
        throw new TransportError('invalid_response', 'scraper', 'response body is not JSON', {
          statusCode: res.status,
          attempt,
          cause: error,
        });
      }

      const normalized = normalizeScraperResponse(json, maxResults);
      if (!normalized.success) {
        throw new TransportError('invalid_response', 'scraper', normalized.error, {
          statusCode: res.status,
          attempt,
        });
      }
      if (normalized.dropped > 0) {
        this.logger.warn(`Dropped ${normalized.dropped} malformed or duplicate paper records`);
      }
      return normalized.papers;
    } catch (error) {
      if (upstream?.aborted) throw new AbortedError(upstream.reason);
      if (scope.timedOut()) {
        throw new TransportError('timeout', 'scraper', `no response within ${this.config.timeoutMs}ms`, {
          attempt,
        });
      }
      if (error instanceof TransportError) throw error;
      // node-fetch raises FetchError for refused, reset and DNS failures alike
      throw new TransportError('connection_failed', 'scraper', errorMessage(error), { attempt, cause: error });
    } finally {
      scope.dispose();
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
