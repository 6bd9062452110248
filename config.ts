import { ConfigurationError } from './errors';

export interface GeminiSettings {
  model: string;
  temperature: number;
  topP: number;
  topK: number;
  maxOutputTokens: number;
}

export interface AppConfig {
  apiKey: string;
  gemini: GeminiSettings;
}

export type EnvSource = Partial<Record<
  | 'API_KEY'
  | 'GEMINI_API_KEY'
  | 'GEMINI_MODEL'
  | 'GEMINI_TEMPERATURE'
  | 'GEMINI_TOP_P'
  | 'GEMINI_TOP_K'
  | 'GEMINI_MAX_OUTPUT_TOKENS',
  string
>>;

export const DEFAULT_GEMINI_SETTINGS: GeminiSettings = {
  model: 'gemini-2.5-flash',
  temperature: 0.7,
  topP: 0.8,
  topK: 40,
  maxOutputTokens: 2048
};

// Each property is spelled out so Vite's `define` can replace it in the bundle.
const readProcessEnv = (): EnvSource => ({
  API_KEY: process.env.API_KEY,
  GEMINI_API_KEY: process.env.GEMINI_API_KEY,
  GEMINI_MODEL: process.env.GEMINI_MODEL,
  GEMINI_TEMPERATURE: process.env.GEMINI_TEMPERATURE,
  GEMINI_TOP_P: process.env.GEMINI_TOP_P,
  GEMINI_TOP_K: process.env.GEMINI_TOP_K,
  GEMINI_MAX_OUTPUT_TOKENS: process.env.GEMINI_MAX_OUTPUT_TOKENS
});

const readNumber = (name: keyof EnvSource, raw: string | undefined, fallback: number): number => {
  const value = raw?.trim();
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
};

export const loadConfig = (env: EnvSource = readProcessEnv()): AppConfig => {
  const apiKey = (env.API_KEY || env.GEMINI_API_KEY || '').trim();
  if (!apiKey) {
    throw new ConfigurationError('API_KEY is missing from environment variables.');
  }

  return {
    apiKey,
    gemini: {
      model: env.GEMINI_MODEL?.trim() || DEFAULT_GEMINI_SETTINGS.model,
      temperature: readNumber('GEMINI_TEMPERATURE', env.GEMINI_TEMPERATURE, DEFAULT_GEMINI_SETTINGS.temperature),
      topP: readNumber('GEMINI_TOP_P', env.GEMINI_TOP_P, DEFAULT_GEMINI_SETTINGS.topP),
      topK: readNumber('GEMINI_TOP_K', env.GEMINI_TOP_K, DEFAULT_GEMINI_SETTINGS.topK),
      maxOutputTokens: readNumber('GEMINI_MAX_OUTPUT_TOKENS', env.GEMINI_MAX_OUTPUT_TOKENS, DEFAULT_GEMINI_SETTINGS.maxOutputTokens)
    }
  };
};
