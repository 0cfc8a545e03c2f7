import { describe, it, expect } from 'vitest';
import { loadConfig } from '../lib/config.js';
import { ConfigError } from '../lib/errors.js';

const BASE = { NODE_ENV: 'test', ANTHROPIC_API_KEY: 'test-secret' };

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(BASE);

    expect(config.port).toBe(3001);
    expect(config.logLevel).toBe('debug');
    expect(config.trustProxy).toBe(false);
    expect(config.allowedOrigins).toEqual(['http://localhost:5173', 'http://localhost:5174']);
    expect(config.llm).toMatchObject({
      provider: 'anthropic',
      apiKey: 'test-secret',
      temperature: 0.3,
      maxTokens: 8192,
      timeoutMs: 180_000,
      maxAttempts: 2,
    });
    expect(config.jobSearch).toEqual({ apiKey: undefined, host: 'jsearch.p.rapidapi.com', timeoutMs: 10_000 });
    expect(config.persistence.backend).toBe('csv');
    expect(config.persistence.dataDir).toBe('data');
    expect(config.pipeline).toEqual({
      defaultNumJobs: 5,
      batchScoring: false,
      maxResumeChars: 30_000,
      rateLimitPerMinute: 10,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('infers the provider from the credentials present', () => {
    expect(loadConfig({ NODE_ENV: 'test', ZAI_API_KEY: 'test-secret' }).llm).toMatchObject({
      provider: 'zai',
      baseUrl: 'https://api.z.ai/api/paas/v4',
    });
    expect(loadConfig({ NODE_ENV: 'test', OLLAMA_BASE_URL: 'http://gpu-box:11434/v1' }).llm).toMatchObject({
      provider: 'ollama',
      baseUrl: 'http://gpu-box:11434/v1',
      apiKey: undefined,
    });
  });

  it('requires a key for the selected provider', () => {
    expect(() => loadConfig({ NODE_ENV: 'test' })).toThrow(
      'Invalid configuration: ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic',
    );
    expect(() => loadConfig({ NODE_ENV: 'test', LLM_PROVIDER: 'ZAI' })).toThrow(
      'ZAI_API_KEY is required when LLM_PROVIDER=zai',
    );
  });

  it('requires Supabase credentials for the supabase backend', () => {
    expect(() => loadConfig({ ...BASE, PERSISTENCE_BACKEND: 'supabase' })).toThrow(ConfigError);
    const config = loadConfig({
      ...BASE,
      PERSISTENCE_BACKEND: 'supabase',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
    });
    expect(config.persistence.backend).toBe('supabase');
  });

  it('parses numbers, booleans and origin lists', () => {
    const config = loadConfig({
      ...BASE,
      PORT: '8080',
      TRUST_PROXY: 'yes',
      PIPELINE_BATCH_SCORING: 'TRUE',
      PIPELINE_DEFAULT_NUM_JOBS: '3',
      ALLOWED_ORIGINS: 'https://a.example, https://b.example,',
    });
    expect(config.port).toBe(8080);
    expect(config.trustProxy).toBe(true);
    expect(config.pipeline.batchScoring).toBe(true);
    expect(config.pipeline.defaultNumJobs).toBe(3);
    expect(config.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
  });

  it('has no default origins in production', () => {
    const config = loadConfig({ ...BASE, NODE_ENV: 'production' });
    expect(config.allowedOrigins).toEqual([]);
    expect(config.logLevel).toBe('info');
  });

  it.each([
    ['PORT', '70000'],
    ['PIPELINE_DEFAULT_NUM_JOBS', '11'],
    ['LLM_TEMPERATURE', 'hot'],
    ['TRUST_PROXY', 'maybe'],
    ['PERSISTENCE_BACKEND', 'postgres'],
  ])('rejects %s=%s', (key, value) => {
    expect(() => loadConfig({ ...BASE, [key]: value })).toThrow(ConfigError);
  });
});
