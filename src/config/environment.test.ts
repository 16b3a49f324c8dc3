import { describe, expect, it } from 'vitest';
import { loadConfig, requireIngestionSettings } from './environment';
import { ConfigurationInvalidError } from '../utils/errors';

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationInvalidError) return error.problems;
    throw error;
  }
  throw new Error('expected a ConfigurationInvalidError');
}

describe('loadConfig', () => {
  it('fills defaults for an ollama setup', () => {
    const config = loadConfig({ LLM_PROVIDER: 'ollama' });

    expect(config.port).toBe(5001);
    expect(config.mailbox).toEqual({
      host: 'imap.gmail.com',
      port: 993,
      secure: true,
      mailbox: 'INBOX',
      user: '',
      password: '',
    });
    expect(config.provider).toEqual({
      type: 'ollama',
      ollama: {
        baseUrl: 'http://localhost:11434',
        llmModel: 'llama3.1:8b',
        embeddingModel: 'llama3.1:8b',
      },
    });
    expect(config.vectorStore).toEqual({ directory: 'vector_store', collection: 'emails' });
    expect(config.llmTemperature).toBe(0.2);
    expect(config.defaultRetrievalCount).toBe(50);
    expect(config.debugLogFile).toBeUndefined();
  });

  it('normalizes the provider name', () => {
    const config = loadConfig({ LLM_PROVIDER: 'Gemini', GOOGLE_API_KEY: 'test-secret' });

    expect(config.provider).toEqual({
      type: 'gemini',
      gemini: { apiKey: 'test-secret', llmModel: 'gemini-2.0-flash', embeddingModel: 'text-embedding-004' },
    });
  });

  it('requires a provider', () => {
    expect(problemsOf(() => loadConfig({}))).toEqual([
      "LLM_PROVIDER is required (must be 'ollama' or 'gemini')",
    ]);
  });

  it('rejects unknown providers', () => {
    expect(problemsOf(() => loadConfig({ LLM_PROVIDER: 'openai' }))).toEqual([
      "LLM_PROVIDER must be 'ollama' or 'gemini', got 'openai'",
    ]);
  });

  it('requires an API key for gemini', () => {
    expect(problemsOf(() => loadConfig({ LLM_PROVIDER: 'gemini' }))).toEqual([
      'GOOGLE_API_KEY is required when LLM_PROVIDER=gemini',
    ]);
  });

  it('reports a blank ollama model', () => {
    expect(problemsOf(() => loadConfig({ LLM_PROVIDER: 'ollama', OLLAMA_LLM_MODEL: '  ' }))).toEqual([
      'OLLAMA_LLM_MODEL is required when LLM_PROVIDER=ollama',
    ]);
  });

  it('reports malformed numbers by variable name', () => {
    const problems = problemsOf(() => loadConfig({ LLM_PROVIDER: 'ollama', PORT: 'abc' }));

    expect(problems).toHaveLength(1);
    expect(problems[0].startsWith('PORT: ')).toBe(true);
  });
});

describe('requireIngestionSettings', () => {
  const base = loadConfig({
    LLM_PROVIDER: 'ollama',
    EMAIL_ID: 'someone@example.com',
    APP_PASSWORD: 'test-secret',
    START_DATE: '2025-01-01',
    END_DATE: '2025-01-31',
  });

  it('accepts a complete configuration', () => {
    expect(() => requireIngestionSettings(base)).not.toThrow();
  });

  it('accepts a single-day range', () => {
    expect(() => requireIngestionSettings(base, { startDate: '2025-01-15', endDate: '2025-01-15' })).not.toThrow();
  });

  it('collects every missing setting', () => {
    const config = loadConfig({ LLM_PROVIDER: 'ollama' });

    expect(problemsOf(() => requireIngestionSettings(config))).toEqual([
      'EMAIL_ID is required',
      'APP_PASSWORD is required',
      'START_DATE is required (format: YYYY-MM-DD)',
      'END_DATE is required (format: YYYY-MM-DD)',
    ]);
  });

  it('rejects malformed dates', () => {
    expect(problemsOf(() => requireIngestionSettings(base, { startDate: '2025-02-30', endDate: '2025-03-01' }))).toEqual([
      "START_DATE must be a valid YYYY-MM-DD date, got '2025-02-30'",
    ]);
  });

  it('rejects a start date after the end date', () => {
    expect(problemsOf(() => requireIngestionSettings(base, { startDate: '2025-02-01', endDate: '2025-01-01' }))).toEqual([
      'START_DATE (2025-02-01) must not be after END_DATE (2025-01-01)',
    ]);
  });
});
