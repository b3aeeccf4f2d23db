import {
  GoogleGenerativeAI,
  GoogleGenerativeAIError,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIRequestInputError,
  GoogleGenerativeAIResponseError,
  type GenerativeModel,
} from '@google/generative-ai';
import { TransportError, isConnectionError, kindForStatus } from '../utils/transport';
import type { LLMProvider, ProviderCompletion } from './llmClient';

export interface GeminiProviderConfig {
  apiKey?: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
}

const RETRY_INFO_TYPE = 'type.googleapis.com/google.rpc.RetryInfo';

/** Reads `RetryInfo.retryDelay` ("37s", "1.5s") from a Gemini error payload. */
export function retryDelayFromDetails(details: unknown): number | undefined {
  if (!Array.isArray(details)) return undefined;
  for (const detail of details) {
    if (!detail || typeof detail !== 'object') continue;
    const type: unknown = Reflect.get(detail, '@type');
    const delay: unknown = Reflect.get(detail, 'retryDelay');
    if (type !== RETRY_INFO_TYPE || typeof delay !== 'string') continue;
    const match = /^(\d+(?:\.\d+)?)s$/.exec(delay.trim());
    if (match?.[1]) return Math.round(Number(match[1]) * 1000);
  }
  return undefined;
}

export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini';
  private model: GenerativeModel;

  constructor(private config: GeminiProviderConfig) {
    if (!config.apiKey) {
      throw new Error('GOOGLE_API_KEY environment variable is not set');
    }
    const genAI = new GoogleGenerativeAI(config.apiKey);
    this.model = genAI.getGenerativeModel({ model: config.model });
  }

  async complete(prompt: string, options: { signal: AbortSignal }): Promise<ProviderCompletion> {
    let result;
    try {
      result = await this.model.generateContent(
        {
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig: {
            temperature: this.config.temperature,
            maxOutputTokens: this.config.maxOutputTokens,
          },
        },
        { signal: options.signal }
      );
    } catch (error) {
      if (error instanceof GoogleGenerativeAIFetchError && error.status !== undefined) {
        throw new TransportError(kindForStatus(error.status), 'llm', error.statusText ?? error.message, {
          statusCode: error.status,
          retryAfterMs: retryDelayFromDetails(error.errorDetails),
          cause: error,
        });
      }
      if (error instanceof GoogleGenerativeAIRequestInputError) {
        throw new TransportError('client_error', 'llm', error.message, { cause: error });
      }
      if (error instanceof GoogleGenerativeAIError && !isConnectionError(error)) {
        // unparseable or statusless answers from the API
        throw new TransportError('server_error', 'llm', error.message, { cause: error });
      }
      throw error;
    }

    const response = result.response;
    const candidate = response.candidates?.[0];
    const finishReason = candidate?.finishReason ?? response.promptFeedback?.blockReason;

    let text = '';
    try {
      text = response.text();
    } catch (error) {
      // text() throws when the candidate was blocked; the empty text is reported downstream
      if (!(error instanceof GoogleGenerativeAIResponseError)) throw error;
    }

    return {
      text,
      model: this.config.model,
      finishReason: finishReason ? String(finishReason) : undefined,
      inputTokens: response.usageMetadata?.promptTokenCount,
      outputTokens: response.usageMetadata?.candidatesTokenCount,
    };
  }
}
