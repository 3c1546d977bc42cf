import 'dotenv/config';

import { z } from 'zod';

const optionalNonEmptyString = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().min(1).optional());

const optionalUrl = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().url().optional());

const booleanFlag = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}, z.boolean());

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().trim().min(1).default('*'),
  API_KEY: optionalNonEmptyString,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  TRACE_STORE: z.enum(['postgres', 'memory']).default('postgres'),
  DB_HOST: z.string().trim().min(1).default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USERNAME: z.string().trim().default('postgres'),
  DB_PASSWORD: z.string().trim().default('postgres'),
  DB_NAME: z.string().trim().min(1).default('glassbox'),
  DB_LOGGING: booleanFlag.default(false),
  LLM_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  OPENAI_API_KEY: optionalNonEmptyString,
  OPENAI_BASE_URL: optionalUrl,
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  AGENT_MAX_ITERATIONS: z.coerce.number().int().min(1).max(50).default(10),
  AGENT_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(300),
  AGENT_HISTORY_WINDOW: z.coerce.number().int().min(0).max(50).default(5),
  REASONING_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
