import type { RetrySettings } from '../config/settings';
import { LaneLimiter } from '../utils/limiter';
import { createConsoleLogger, type Logger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import { AbortedError, attemptScope, raceWithSignal } from '../utils/timeout';
import {
  TransportError,
  isConnectionError,
  isRetryableTransportError,
  transportRetryAfterMs,
} from '../utils/transport';

export interface ProviderCompletion {
  text: string;
  model: string;
  finishReason?: string;
  inputTokens?: number;
  outputTokens?: number;
}

/**
 * A text-generation backend. Implementations throw TransportError for the SDK failures
 * they know. The client also treats network failures as transient; any other error is
 * a defect and reaches the caller unchanged, without a retry.
 */
export interface LLMProvider {
  readonly name: string;
  complete(prompt: string, options: { signal: AbortSignal }): Promise<ProviderCompletion>;
}

export interface LLMGeneration extends ProviderCompletion {
  latencyMs: number;
  attempts: number;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  /** Label for logs, e.g. the analysis task. */
  label?: string;
}

export interface TextGenerator {
  generate(prompt: string, options?: GenerateOptions): Promise<LLMGeneration>;
}

export interface LLMClientConfig {
  timeoutMs: number;
  retry: RetrySettings;
}

export class LLMClient implements TextGenerator {
  constructor(
    private provider: LLMProvider,
    private config: LLMClientConfig,
    private logger: Logger = createConsoleLogger('LLMClient'),
    private limiter: LaneLimiter = new LaneLimiter()
  ) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<LLMGeneration> {
    const label = options.label ?? 'generate';
    const startedAt = Date.now();
    let attempts = 0;

    const completion = await withRetry(
      async (attempt) => {
        attempts = attempt;
        this.logger.info(`[${label}] Attempt ${attempt}/${this.config.retry.maxAttempts}`, {
          provider: this.provider.name,
          timeoutMs: this.config.timeoutMs,
        });
        return this.limiter.limit('llm', () => this.attempt(prompt, attempt, options.signal));
      },
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
          this.logger.warn(`[${label}] Error on attempt ${attempt}, retrying in ${delayMs}ms`, {
            error: error instanceof Error ? error.message : String(error),
            rateLimited: error instanceof TransportError && error.kind === 'rate_limited',
          });
        },
      }
    );

    const latencyMs = Date.now() - startedAt;
    this.logger.info(`[${label}] Success on attempt ${attempts}`, {
      model: completion.model,
      latencyMs,
      finishReason: completion.finishReason,
      inputTokens: completion.inputTokens,
      outputTokens: completion.outputTokens,
      responseChars: completion.text.length,
    });

    return { ...completion, latencyMs, attempts };
  }

  private async attempt(
    prompt: string,
    attempt: number,
    upstream?: AbortSignal
  ): Promise<ProviderCompletion> {
    if (upstream?.aborted) throw new AbortedError(upstream.reason);
    const scope = attemptScope(this.config.timeoutMs, upstream);
    try {
      const call = this.provider.complete(prompt, { signal: scope.signal });
      return await raceWithSignal(call, scope.signal);
    } catch (error) {
      if (upstream?.aborted) {
        throw new AbortedError(upstream.reason);
      }
      if (scope.timedOut()) {
        throw new TransportError('timeout', 'llm', `no response within ${this.config.timeoutMs}ms`, {
          attempt,
        });
      }
      if (error instanceof TransportError) {
        return rethrowWithAttempt(error, attempt);
      }
      if (isConnectionError(error)) {
        throw new TransportError('connection_failed', 'llm', errorMessage(error), { attempt, cause: error });
      }
      throw error;
    } finally {
      scope.dispose();
    }
  }
}

function rethrowWithAttempt(error: TransportError, attempt: number): never {
  if (error.attempt === attempt) throw error;
  throw new TransportError(error.kind, error.service, error.detail, {
    statusCode: error.statusCode,
    retryAfterMs: error.retryAfterMs,
    attempt,
    cause: error.cause,
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
