import type { Settings } from '../config/settings';
import { GeminiProvider } from './geminiProvider';
import type { LLMProvider } from './llmClient';
import { OpenAIProvider } from './openaiProvider';

/** Builds the provider named by `LLM_PROVIDER`. */
export function createLLMProvider(llm: Settings['llm']): LLMProvider {
  switch (llm.provider) {
    case 'gemini':
      return new GeminiProvider(llm);
    case 'openai':
      return new OpenAIProvider({
        apiKey: llm.openai.apiKey,
        model: llm.openai.model,
        temperature: llm.temperature,
        maxOutputTokens: llm.maxOutputTokens,
      });
  }
}
