import { describe, expect, it } from 'vitest';
import { DEFAULT_GEMINI_SETTINGS, loadConfig } from './config';
import { ConfigurationError } from './errors';

describe('loadConfig', () => {
  it('requires an API key', () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(() => loadConfig({ API_KEY: '   ' })).toThrow('API_KEY is missing from environment variables.');
  });

  it('uses the default model settings', () => {
    expect(loadConfig({ API_KEY: 'test-secret' })).toEqual({
      apiKey: 'test-secret',
      gemini: DEFAULT_GEMINI_SETTINGS
    });
  });

  it('falls back to GEMINI_API_KEY', () => {
    expect(loadConfig({ GEMINI_API_KEY: 'test-secret' }).apiKey).toBe('test-secret');
  });

  it('reads overrides', () => {
    const config = loadConfig({
      API_KEY: 'test-secret',
      GEMINI_MODEL: 'gemini-2.0-flash',
      GEMINI_TEMPERATURE: '0.2',
      GEMINI_TOP_P: '0.9',
      GEMINI_TOP_K: '20',
      GEMINI_MAX_OUTPUT_TOKENS: '1024'
    });

    expect(config.gemini).toEqual({
      model: 'gemini-2.0-flash',
      temperature: 0.2,
      topP: 0.9,
      topK: 20,
      maxOutputTokens: 1024
    });
  });

  it('treats blank settings as unset', () => {
    expect(loadConfig({ API_KEY: 'test-secret', GEMINI_TEMPERATURE: '', GEMINI_MODEL: '' }).gemini).toEqual(DEFAULT_GEMINI_SETTINGS);
  });

  it('rejects a setting that is not a number', () => {
    expect(() => loadConfig({ API_KEY: 'test-secret', GEMINI_TEMPERATURE: 'warm' })).toThrow(
      'GEMINI_TEMPERATURE must be a number, got "warm"'
    );
  });
});
