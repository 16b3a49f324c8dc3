// config/environment.ts
import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { ConfigurationInvalidError } from '../utils/errors';
import { parseCalendarDate } from '../utils/dateUtils';
import type { LLMProviderType } from '../Types/model';

export const isProduction = process.env.NODE_ENV === 'production';

/**
 * Loads `.env.production` or `.env.development` into process.env.
 * Only process entry points call this; components receive an AppConfig instead.
 */
export function loadEnvFiles() {
  dotenv.config({ path: path.resolve(process.cwd(), isProduction ? '.env.production' : '.env.development') });
  dotenv.config({ path: path.resolve(process.cwd(), '.env') });
}

export interface MailboxSettings {
  host: string;
  port: number;
  secure: boolean;
  mailbox: string;
  user: string;
  password: string;
}

export interface OllamaSettings {
  baseUrl: string;
  llmModel: string;
  embeddingModel: string;
}

export interface GeminiSettings {
  apiKey: string;
  llmModel: string;
  embeddingModel: string;
}

export type ProviderSettings =
  | { type: 'ollama'; ollama: OllamaSettings }
  | { type: 'gemini'; gemini: GeminiSettings };

export interface AppConfig {
  nodeEnv: string;
  port: number;
  mailbox: MailboxSettings;
  dateRange: { startDate: string; endDate: string };
  provider: ProviderSettings;
  vectorStore: { directory: string; collection: string };
  llmTemperature: number;
  defaultRetrievalCount: number;
  debugLogFile?: string;
}

const optionalText = (fallback: string) =>
  z.string().trim().optional().transform(value => (value === undefined || value === '' ? fallback : value));

const envSchema = z.object({
  NODE_ENV: optionalText('development'),
  PORT: optionalText('5001').pipe(z.coerce.number().int().positive()),

  EMAIL_ID: optionalText(''),
  APP_PASSWORD: optionalText(''),
  IMAP_HOST: optionalText('imap.gmail.com'),
  IMAP_PORT: optionalText('993').pipe(z.coerce.number().int().positive()),
  IMAP_SECURE: optionalText('true').pipe(z.enum(['true', 'false'])),
  IMAP_MAILBOX: optionalText('INBOX'),

  START_DATE: optionalText(''),
  END_DATE: optionalText(''),

  LLM_PROVIDER: optionalText('').transform(value => value.toLowerCase()),

  OLLAMA_BASE_URL: z.string().trim().default('http://localhost:11434'),
  OLLAMA_LLM_MODEL: z.string().trim().default('llama3.1:8b'),
  OLLAMA_EMBEDDING_MODEL: z.string().trim().default('llama3.1:8b'),

  GOOGLE_API_KEY: optionalText(''),
  GEMINI_LLM_MODEL: optionalText('gemini-2.0-flash'),
  GEMINI_EMBEDDING_MODEL: optionalText('text-embedding-004'),

  VECTOR_STORE_DIRECTORY: optionalText('vector_store'),
  VECTOR_STORE_COLLECTION: optionalText('emails'),

  LLM_TEMPERATURE: optionalText('0.2').pipe(z.coerce.number().min(0).max(2)),
  DEFAULT_RETRIEVAL_COUNT: optionalText('50').pipe(z.coerce.number().int().positive()),

  DEBUG_LOG_FILE: z.string().trim().optional(),
});

type ParsedEnv = z.infer<typeof envSchema>;

function providerSettings(env: ParsedEnv, problems: string[]): ProviderSettings | null {
  const provider = env.LLM_PROVIDER;
  if (!provider) {
    problems.push("LLM_PROVIDER is required (must be 'ollama' or 'gemini')");
    return null;
  }
  if (!isProviderType(provider)) {
    problems.push(`LLM_PROVIDER must be 'ollama' or 'gemini', got '${provider}'`);
    return null;
  }

  if (provider === 'ollama') {
    if (!env.OLLAMA_BASE_URL) problems.push('OLLAMA_BASE_URL is required when LLM_PROVIDER=ollama');
    if (!env.OLLAMA_LLM_MODEL) problems.push('OLLAMA_LLM_MODEL is required when LLM_PROVIDER=ollama');
    if (!env.OLLAMA_EMBEDDING_MODEL) problems.push('OLLAMA_EMBEDDING_MODEL is required when LLM_PROVIDER=ollama');
    return {
      type: 'ollama',
      ollama: {
        baseUrl: env.OLLAMA_BASE_URL,
        llmModel: env.OLLAMA_LLM_MODEL,
        embeddingModel: env.OLLAMA_EMBEDDING_MODEL,
      },
    };
  }

  if (!env.GOOGLE_API_KEY) problems.push('GOOGLE_API_KEY is required when LLM_PROVIDER=gemini');
  return {
    type: 'gemini',
    gemini: {
      apiKey: env.GOOGLE_API_KEY,
      llmModel: env.GEMINI_LLM_MODEL,
      embeddingModel: env.GEMINI_EMBEDDING_MODEL,
    },
  };
}

function isProviderType(value: string): value is LLMProviderType {
  return value === 'ollama' || value === 'gemini';
}

/**
 * Builds the application configuration from environment variables.
 * Every problem found is reported at once in a single ConfigurationInvalidError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationInvalidError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const problems: string[] = [];
  const provider = providerSettings(values, problems);

  if (problems.length > 0 || !provider) {
    throw new ConfigurationInvalidError(problems);
  }

  return {
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    mailbox: {
      host: values.IMAP_HOST,
      port: values.IMAP_PORT,
      secure: values.IMAP_SECURE === 'true',
      mailbox: values.IMAP_MAILBOX,
      user: values.EMAIL_ID,
      password: values.APP_PASSWORD,
    },
    dateRange: { startDate: values.START_DATE, endDate: values.END_DATE },
    provider,
    vectorStore: {
      directory: values.VECTOR_STORE_DIRECTORY,
      collection: values.VECTOR_STORE_COLLECTION,
    },
    llmTemperature: values.LLM_TEMPERATURE,
    defaultRetrievalCount: values.DEFAULT_RETRIEVAL_COUNT,
    debugLogFile: values.DEBUG_LOG_FILE || undefined,
  };
}

/**
 * Checks the settings only ingestion needs: mailbox credentials and the date range.
 */
export function requireIngestionSettings(config: AppConfig, range = config.dateRange) {
  const problems: string[] = [];

  if (!config.mailbox.user) problems.push('EMAIL_ID is required');
  if (!config.mailbox.password) problems.push('APP_PASSWORD is required');

  const start = range.startDate ? parseCalendarDate(range.startDate) : null;
  const end = range.endDate ? parseCalendarDate(range.endDate) : null;

  if (!range.startDate) problems.push('START_DATE is required (format: YYYY-MM-DD)');
  else if (!start) problems.push(`START_DATE must be a valid YYYY-MM-DD date, got '${range.startDate}'`);

  if (!range.endDate) problems.push('END_DATE is required (format: YYYY-MM-DD)');
  else if (!end) problems.push(`END_DATE must be a valid YYYY-MM-DD date, got '${range.endDate}'`);

  if (start && end && start.getTime() > end.getTime()) {
    problems.push(`START_DATE (${range.startDate}) must not be after END_DATE (${range.endDate})`);
  }

  if (problems.length > 0) {
    throw new ConfigurationInvalidError(problems);
  }
}
