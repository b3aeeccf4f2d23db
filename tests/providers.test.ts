import { describe, it, expect } from '@jest/globals';
import { createLLMProvider } from '../src/agents/providers';
import { loadSettings } from '../src/config/settings';

describe('createLLMProvider', () => {
  it('builds Gemini by default', () => {
    const { llm } = loadSettings({ GOOGLE_API_KEY: 'test-google-key' });

    expect(createLLMProvider(llm).name).toBe('gemini');
  });

  it('builds OpenAI when selected', () => {
    const { llm } = loadSettings({ LLM_PROVIDER: 'openai', OPENAI_API_KEY: 'test-openai-key' });

    expect(createLLMProvider(llm).name).toBe('openai');
  });

  it('asks for the key of the selected provider', () => {
    const { llm } = loadSettings({ LLM_PROVIDER: 'openai', GOOGLE_API_KEY: 'test-google-key' });

    expect(() => createLLMProvider(llm)).toThrow('OPENAI_API_KEY environment variable is not set');
  });
});
