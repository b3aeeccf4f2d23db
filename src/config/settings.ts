import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export const LLM_PROVIDERS = ['gemini', 'openai'] as const;

function envBoolean(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase())
    .pipe(z.enum(['true', 'false', '1', '0']).optional())
    .transform((value) => (value === undefined ? defaultValue : value === 'true' || value === '1'));
}

function envInt(defaultValue: number, min = 1) {
  return z.coerce.number().int().min(min).default(defaultValue);
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: envInt(8001),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  CORS_ORIGIN: z.string().default('*'),
  API_KEY: optionalString,

  SCRAPER_URL: z.string().url().default('http://localhost:8002'),
  SCRAPER_API_KEY: optionalString,

  LLM_PROVIDER: z.enum(LLM_PROVIDERS).default('gemini'),
  GOOGLE_API_KEY: optionalString,
  LLM_MODEL: z.string().default('gemini-2.5-flash'),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  LLM_MAX_OUTPUT_TOKENS: envInt(2048),

  REFINE_QUERY_ENABLED: envBoolean(true),
  MAX_PAPERS: envInt(10),
  SCRAPE_TIMEOUT_MS: envInt(15000),
  LLM_TIMEOUT_MS: envInt(30000),
  RETRY_MAX_ATTEMPTS: envInt(3),
  RETRY_BASE_DELAY_MS: envInt(500, 0),
  RETRY_MAX_DELAY_MS: envInt(8000, 0),
  OVERALL_DEADLINE_MS: envInt(90000),
  PROMPT_TOKEN_BUDGET: envInt(6000),
  PROMPT_TEMPLATES_PATH: optionalString,

  LLM_CONCURRENCY: envInt(3),
  SCRAPER_CONCURRENCY: envInt(2),
});

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LLMProviderName = (typeof LLM_PROVIDERS)[number];

export interface RetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitterRatio: number;
}

export interface Settings {
  server: {
    env: 'development' | 'production' | 'test';
    host: string;
    port: number;
    logLevel: LogLevel;
    corsOrigin: string;
    apiKey?: string;
  };
  scraper: {
    baseUrl: string;
    apiKey?: string;
    timeoutMs: number;
    concurrency: number;
    retry: RetrySettings;
  };
  llm: {
    provider: LLMProviderName;
    /** Gemini credentials and model. */
    apiKey?: string;
    model: string;
    openai: {
      apiKey?: string;
      model: string;
    };
    temperature: number;
    maxOutputTokens: number;
    timeoutMs: number;
    concurrency: number;
    retry: RetrySettings;
  };
  pipeline: {
    refineQueryEnabled: boolean;
    maxPapers: number;
    overallDeadlineMs: number;
    promptTokenBudget: number;
    promptTemplatesPath?: string;
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Reads the process environment once into an immutable settings object.
 * Components receive the slice they need; nothing reads `process.env` after this.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Readonly<Settings> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `- ${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n${issues.join('\n')}`);
  }
  const e = parsed.data;

  const retry: RetrySettings = {
    maxAttempts: e.RETRY_MAX_ATTEMPTS,
    baseDelayMs: e.RETRY_BASE_DELAY_MS,
    maxDelayMs: e.RETRY_MAX_DELAY_MS,
    multiplier: 2,
    jitterRatio: 0.2,
  };

  return deepFreeze<Settings>({
    server: {
      env: e.NODE_ENV,
      host: e.HOST,
      port: e.PORT,
      logLevel: e.LOG_LEVEL,
      corsOrigin: e.CORS_ORIGIN,
      apiKey: e.API_KEY,
    },
    scraper: {
      baseUrl: e.SCRAPER_URL.replace(/\/+$/, ''),
      apiKey: e.SCRAPER_API_KEY,
      timeoutMs: e.SCRAPE_TIMEOUT_MS,
      concurrency: e.SCRAPER_CONCURRENCY,
      retry: { ...retry },
    },
    llm: {
      provider: e.LLM_PROVIDER,
      apiKey: e.GOOGLE_API_KEY,
      model: e.LLM_MODEL,
      openai: {
        apiKey: e.OPENAI_API_KEY,
        model: e.OPENAI_MODEL,
      },
      temperature: e.LLM_TEMPERATURE,
      maxOutputTokens: e.LLM_MAX_OUTPUT_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS,
      concurrency: e.LLM_CONCURRENCY,
      retry: { ...retry },
    },
    pipeline: {
      refineQueryEnabled: e.REFINE_QUERY_ENABLED,
      maxPapers: e.MAX_PAPERS,
      overallDeadlineMs: e.OVERALL_DEADLINE_MS,
      promptTokenBudget: e.PROMPT_TOKEN_BUDGET,
      promptTemplatesPath: e.PROMPT_TEMPLATES_PATH,
    },
  });
}
