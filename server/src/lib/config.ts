import { z } from 'zod';
import { ConfigError } from './errors.js';

export type LLMProviderName = 'anthropic' | 'zai' | 'ollama';
export type PersistenceBackend = 'csv' | 'supabase' | 'none';

export interface LLMConfig {
  provider: LLMProviderName;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  maxAttempts: number;
}

export interface JobSearchConfig {
  apiKey?: string;
  host: string;
  timeoutMs: number;
}

export interface PersistenceConfig {
  backend: PersistenceBackend;
  dataDir: string;
  supabaseUrl?: string;
  supabaseServiceKey?: string;
}

export interface PipelineSettings {
  defaultNumJobs: number;
  batchScoring: boolean;
  maxResumeChars: number;
  /** Requests per minute per caller on the pipeline routes. */
  rateLimitPerMinute: number;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  logLevel: string;
  port: number;
  allowedOrigins: string[];
  trustProxy: boolean;
  llm: LLMConfig;
  jobSearch: JobSearchConfig;
  persistence: PersistenceConfig;
  pipeline: PipelineSettings;
  sentryDsn?: string;
}

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const intFromEnv = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? Number(v) : fallback))
    .pipe(z.number().int().min(min).max(max));

const booleanFromEnv = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (!v || !v.trim()) return fallback;
      const normalized = v.trim().toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
      if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${v}"` });
      return z.NEVER;
    });

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).optional().default('development'),
  LOG_LEVEL: optionalString,
  PORT: intFromEnv(3001, 1, 65_535),
  ALLOWED_ORIGINS: optionalString,
  TRUST_PROXY: booleanFromEnv(false),

  LLM_PROVIDER: z
    .string()
    .optional()
    .transform((v) => v?.trim().toLowerCase() || undefined)
    .pipe(z.enum(['anthropic', 'zai', 'ollama']).optional()),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: optionalString,
  ZAI_API_KEY: optionalString,
  ZAI_BASE_URL: optionalString,
  ZAI_MODEL: optionalString,
  OLLAMA_BASE_URL: optionalString,
  OLLAMA_MODEL: optionalString,
  LLM_TEMPERATURE: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? Number(v) : 0.3))
    .pipe(z.number().min(0).max(2)),
  LLM_MAX_TOKENS: intFromEnv(8192, 256),
  LLM_TIMEOUT_MS: intFromEnv(180_000, 1_000),
  LLM_MAX_ATTEMPTS: intFromEnv(2, 1, 5),

  RAPIDAPI_KEY: optionalString,
  RAPIDAPI_HOST: optionalString,
  JOB_SEARCH_TIMEOUT_MS: intFromEnv(10_000, 500),

  PERSISTENCE_BACKEND: z
    .string()
    .optional()
    .transform((v) => v?.trim().toLowerCase() || 'csv')
    .pipe(z.enum(['csv', 'supabase', 'none'])),
  DATA_DIR: optionalString,
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,

  PIPELINE_DEFAULT_NUM_JOBS: intFromEnv(5, 1, 10),
  PIPELINE_BATCH_SCORING: booleanFromEnv(false),
  PIPELINE_MAX_RESUME_CHARS: intFromEnv(30_000, 1_000),
  PIPELINE_RATE_LIMIT_PER_MINUTE: intFromEnv(10, 1),

  SENTRY_DSN: optionalString,
});

type ParsedEnv = z.output<typeof EnvSchema>;

function resolveLLMConfig(env: ParsedEnv): { config: LLMConfig; problems: string[] } {
  const provider: LLMProviderName = env.LLM_PROVIDER
    ?? (env.ZAI_API_KEY ? 'zai' : env.OLLAMA_BASE_URL ? 'ollama' : 'anthropic');
  const problems: string[] = [];
  const shared = {
    temperature: env.LLM_TEMPERATURE,
    maxTokens: env.LLM_MAX_TOKENS,
    timeoutMs: env.LLM_TIMEOUT_MS,
    maxAttempts: env.LLM_MAX_ATTEMPTS,
  };

  if (provider === 'zai') {
    if (!env.ZAI_API_KEY) problems.push('ZAI_API_KEY is required when LLM_PROVIDER=zai');
    return {
      config: {
        provider,
        model: env.ZAI_MODEL ?? 'glm-4.5-air',
        apiKey: env.ZAI_API_KEY,
        baseUrl: env.ZAI_BASE_URL ?? 'https://api.z.ai/api/paas/v4',
        ...shared,
      },
      problems,
    };
  }

  if (provider === 'ollama') {
    return {
      config: {
        provider,
        model: env.OLLAMA_MODEL ?? 'llama3:latest',
        baseUrl: env.OLLAMA_BASE_URL ?? 'http://localhost:11434/v1',
        ...shared,
      },
      problems,
    };
  }

  if (!env.ANTHROPIC_API_KEY) problems.push('ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic');
  return {
    config: {
      provider,
      model: env.ANTHROPIC_MODEL ?? 'claude-sonnet-4-5-20250929',
      apiKey: env.ANTHROPIC_API_KEY,
      ...shared,
    },
    problems,
  };
}

/**
 * Build the application configuration from environment variables.
 * Called once at process start; the returned value is passed to every
 * component that needs it.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  const e = parsed.data;
  const { config: llm, problems } = resolveLLMConfig(e);

  if (e.PERSISTENCE_BACKEND === 'supabase' && (!e.SUPABASE_URL || !e.SUPABASE_SERVICE_ROLE_KEY)) {
    problems.push('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required when PERSISTENCE_BACKEND=supabase');
  }
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  const isProduction = e.NODE_ENV === 'production';
  const config: AppConfig = {
    env: e.NODE_ENV,
    logLevel: e.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
    port: e.PORT,
    allowedOrigins: e.ALLOWED_ORIGINS
      ? e.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
      : isProduction
        ? []
        : ['http://localhost:5173', 'http://localhost:5174'],
    trustProxy: e.TRUST_PROXY,
    llm,
    jobSearch: {
      apiKey: e.RAPIDAPI_KEY,
      host: e.RAPIDAPI_HOST ?? 'jsearch.p.rapidapi.com',
      timeoutMs: e.JOB_SEARCH_TIMEOUT_MS,
    },
    persistence: {
      backend: e.PERSISTENCE_BACKEND,
      dataDir: e.DATA_DIR ?? 'data',
      supabaseUrl: e.SUPABASE_URL,
      supabaseServiceKey: e.SUPABASE_SERVICE_ROLE_KEY,
    },
    pipeline: {
      defaultNumJobs: e.PIPELINE_DEFAULT_NUM_JOBS,
      batchScoring: e.PIPELINE_BATCH_SCORING,
      maxResumeChars: e.PIPELINE_MAX_RESUME_CHARS,
      rateLimitPerMinute: e.PIPELINE_RATE_LIMIT_PER_MINUTE,
    },
    sentryDsn: e.SENTRY_DSN,
  };

  return Object.freeze(config);
}
