export const CLASSIFY_CONFIG = {
  maxAttempts: 3,
  timeoutMs: Number(process.env.LLM_TIMEOUT_MS || '60000'),
  maxTokens: 2048,
  defaultConcurrency: 10,
} as const;

export const DEFAULT_MODEL = process.env.LLM_MODEL || 'gemini-2.5-flash';

export const LANGUAGES = ['en', 'zh'] as const;

export type Language = (typeof LANGUAGES)[number];
