import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { APIConnectionError, APIError, APIUserAbortError, OpenAI } from 'openai';
import { OpenAIProvider } from '../src/agents/openaiProvider';
import { TransportError, isRetryableTransportError } from '../src/utils/transport';

const mockCreate = jest.fn<(body: unknown, options: unknown) => Promise<unknown>>();

jest.mock('openai', () => {
  const actual = jest.requireActual<typeof import('openai')>('openai');
  return {
    ...actual,
    OpenAI: jest.fn(() => ({
      chat: { completions: { create: mockCreate } },
    })),
  };
});

describe('OpenAIProvider', () => {
  const config = { apiKey: 'test-openai-key', model: 'gpt-4', temperature: 0.3, maxOutputTokens: 256 };
  const signal = new AbortController().signal;

  beforeEach(() => {
    mockCreate.mockReset();
  });

  it('requires an API key', () => {
    expect(() => new OpenAIProvider({ ...config, apiKey: undefined })).toThrow(
      'OPENAI_API_KEY environment variable is not set'
    );
  });

  it('turns off the SDK retries', () => {
    new OpenAIProvider(config);

    expect(OpenAI).toHaveBeenCalledWith({ apiKey: 'test-openai-key', maxRetries: 0 });
  });

  it('returns text, finish reason and token usage', async () => {
    mockCreate.mockResolvedValueOnce({
      model: 'gpt-4-0613',
      choices: [{ index: 0, message: { role: 'assistant', content: 'Generated summary' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 90, completion_tokens: 30, total_tokens: 120 },
    });

    const completion = await new OpenAIProvider(config).complete('prompt text', { signal });

    expect(completion).toEqual({
      text: 'Generated summary',
      model: 'gpt-4-0613',
      finishReason: 'stop',
      inputTokens: 90,
      outputTokens: 30,
    });
    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: 'gpt-4',
        temperature: 0.3,
        max_tokens: 256,
        messages: [
          { role: 'system', content: 'You are a helpful research assistant.' },
          { role: 'user', content: 'prompt text' },
        ],
      },
      { signal }
    );
  });

  it('returns empty text when the message has no content', async () => {
    mockCreate.mockResolvedValueOnce({
      model: 'gpt-4',
      choices: [{ index: 0, message: { role: 'assistant', content: null }, finish_reason: 'content_filter' }],
    });

    const completion = await new OpenAIProvider(config).complete('prompt', { signal });

    expect(completion.text).toBe('');
    expect(completion.finishReason).toBe('content_filter');
    expect(completion.inputTokens).toBeUndefined();
  });

  it('maps rate limits to transport errors with the retry hint', async () => {
    mockCreate.mockRejectedValueOnce(
      new APIError(429, { message: 'Rate limit reached' }, 'Rate limit reached', { 'retry-after': '2' })
    );

    const error = await new OpenAIProvider(config).complete('prompt', { signal }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ kind: 'rate_limited', service: 'llm', statusCode: 429, retryAfterMs: 2000 });
  });

  it('maps rejected requests to client errors', async () => {
    mockCreate.mockRejectedValueOnce(
      new APIError(400, { message: 'maximum context length exceeded' }, 'bad request', {})
    );

    const error = await new OpenAIProvider(config).complete('prompt', { signal }).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: 'client_error', statusCode: 400 });
    expect(isRetryableTransportError(error)).toBe(false);
  });

  it('maps network failures to connection errors', async () => {
    mockCreate.mockRejectedValueOnce(new APIConnectionError({ message: 'Connection error.' }));

    const error = await new OpenAIProvider(config).complete('prompt', { signal }).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: 'connection_failed', service: 'llm', detail: 'Connection error.' });
  });

  it('passes aborts through', async () => {
    const abort = new APIUserAbortError();
    mockCreate.mockRejectedValueOnce(abort);

    await expect(new OpenAIProvider(config).complete('prompt', { signal })).rejects.toBe(abort);
  });
});
