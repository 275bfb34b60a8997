/**
 * Central configuration. All env vars are read here so the rest of the app
 * stays env-agnostic and testable. Library code (ChatAgent, rubric services)
 * receives explicit values and never touches process.env.
 */
import dotenv from 'dotenv';

dotenv.config();

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function listFromEnv(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export const config = {
  env: process.env.NODE_ENV || 'development',
  appName: process.env.APP_NAME || 'rubric-prompt-service',
  host: process.env.HOST || '0.0.0.0',
  port: intFromEnv(process.env.PORT, 8888),
  logLevel: process.env.LOG_LEVEL || 'info',

  azureOpenAI: {
    key: process.env.AZURE_OPENAI_KEY || '',
    endpoint: process.env.AZURE_OPENAI_ENDPOINT || '',
    /** Logical model name sent with every request, e.g. gpt-4o-mini. */
    model: process.env.AZURE_OPENAI_MODEL || '',
    /** Azure deployment serving the model; empty means "same as model". */
    deployment: process.env.AZURE_OPENAI_DEPLOYMENT || '',
    apiVersion: process.env.AZURE_OPENAI_API_VERSION || '2024-06-01',
    timeoutMs: intFromEnv(process.env.AZURE_OPENAI_TIMEOUT_MS, 60_000),
  },

  chat: {
    /**
     * Server-side output schema for POST /api/chat, as "path:type" pairs.
     * Clients cannot override it. Set CHAT_SCHEMA_FIELDS= (empty) to disable.
     */
    schemaFields: process.env.CHAT_SCHEMA_FIELDS ?? 'author.name:text,author.age:int',
    schemaRequired: listFromEnv(process.env.CHAT_SCHEMA_REQUIRED),
  },
} as const;

export type AppConfig = typeof config;
