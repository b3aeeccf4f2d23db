import { APIConnectionError, APIError, APIUserAbortError, OpenAI, OpenAIError } from 'openai';
import { TransportError, kindForStatus, parseRetryAfterMs } from '../utils/transport';
import type { LLMProvider, ProviderCompletion } from './llmClient';

export interface OpenAIProviderConfig {
  apiKey?: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
}

const SYSTEM_PROMPT = 'You are a helpful research assistant.';

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  private client: OpenAI;

  constructor(private config: OpenAIProviderConfig) {
    if (!config.apiKey) {
      throw new Error('OPENAI_API_KEY environment variable is not set');
    }
    // LLMClient owns retries and timeouts
    this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
  }

  async complete(prompt: string, options: { signal: AbortSignal }): Promise<ProviderCompletion> {
    let response;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          temperature: this.config.temperature,
          max_tokens: this.config.maxOutputTokens,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: prompt },
          ],
        },
        { signal: options.signal }
      );
    } catch (error) {
      throw toTransportError(error);
    }

    const choice = response.choices[0];
    return {
      text: choice?.message.content ?? '',
      model: response.model || this.config.model,
      finishReason: choice?.finish_reason,
      inputTokens: response.usage?.prompt_tokens,
      outputTokens: response.usage?.completion_tokens,
    };
  }
}

function toTransportError(error: unknown): unknown {
  // aborts are resolved by the caller's signals
  if (error instanceof APIUserAbortError) return error;
  if (error instanceof APIConnectionError) {
    return new TransportError('connection_failed', 'llm', error.message, { cause: error });
  }
  if (error instanceof APIError && error.status !== undefined) {
    return new TransportError(kindForStatus(error.status), 'llm', error.message, {
      statusCode: error.status,
      retryAfterMs: parseRetryAfterMs(error.headers?.['retry-after']),
      cause: error,
    });
  }
  if (error instanceof OpenAIError) {
    return new TransportError('client_error', 'llm', error.message, { cause: error });
  }
  return error;
}
