import type { LLMConfig } from './config.js';
import {
  AnthropicProvider,
  OpenAICompatibleProvider,
  type LLMProvider,
  type TokenUsage,
} from './llm-provider.js';
import { withRetry } from './retry.js';
import logger from './logger.js';

// ─── Text-generation contract consumed by the pipeline stages ────────

/** Tool definition used to ask the model for schema-shaped output. */
export interface StructuredOutputSpec {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export interface GenerationRequest {
  system: string;
  prompt: string;
  maxTokens?: number;
  structuredOutput?: StructuredOutputSpec;
  signal?: AbortSignal;
}

export interface GenerationResult {
  /** Raw generated text; may contain prose and code fences. */
  text: string;
  /** Present when the provider answered through the requested structured-output tool. */
  structured?: Record<string, unknown>;
  usage: TokenUsage;
}

export interface TextGenerator {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

// ─── Provider-backed generator ───────────────────────────────────────

export function createProvider(config: LLMConfig): LLMProvider {
  switch (config.provider) {
    case 'anthropic':
      return new AnthropicProvider({ apiKey: config.apiKey ?? '', timeoutMs: config.timeoutMs });
    case 'zai':
      return new OpenAICompatibleProvider({
        name: 'zai',
        apiKey: config.apiKey,
        baseUrl: config.baseUrl ?? 'https://api.z.ai/api/paas/v4',
        timeoutMs: config.timeoutMs,
      });
    case 'ollama':
      return new OpenAICompatibleProvider({
        name: 'ollama',
        baseUrl: config.baseUrl ?? 'http://localhost:11434/v1',
        timeoutMs: config.timeoutMs,
      });
  }
}

export class ProviderTextGenerator implements TextGenerator {
  constructor(
    private readonly provider: LLMProvider,
    private readonly config: Pick<LLMConfig, 'model' | 'temperature' | 'maxTokens' | 'maxAttempts'>,
  ) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const tool = request.structuredOutput;
    const response = await withRetry(
      () => this.provider.chat({
        model: this.config.model,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: this.config.temperature,
        signal: request.signal,
        ...(tool && {
          tools: [tool],
          tool_choice: { type: 'tool' as const, name: tool.name },
        }),
      }),
      {
        maxAttempts: this.config.maxAttempts,
        onRetry: (attempt, err) => {
          logger.warn(
            { provider: this.provider.name, attempt, error: err instanceof Error ? err.message : String(err) },
            'Transient LLM failure, retrying',
          );
        },
      },
    );

    const call = tool ? response.tool_calls.find((tc) => tc.name === tool.name) : undefined;
    return {
      text: response.text,
      ...(call && { structured: call.input }),
      usage: response.usage,
    };
  }
}

export function createTextGenerator(config: LLMConfig): TextGenerator {
  return new ProviderTextGenerator(createProvider(config), config);
}

// ─── Per-run usage accounting ────────────────────────────────────────

export interface UsageSnapshot {
  generation_calls: number;
  input_tokens: number;
  output_tokens: number;
}

/**
 * Wraps a generator for the duration of one pipeline run and counts every
 * call made through it, including calls that fail.
 */
export class UsageTracker implements TextGenerator {
  private calls = 0;
  private inputTokens = 0;
  private outputTokens = 0;

  constructor(private readonly inner: TextGenerator) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    this.calls++;
    const result = await this.inner.generate(request);
    this.inputTokens += result.usage.input_tokens;
    this.outputTokens += result.usage.output_tokens;
    return result;
  }

  snapshot(): UsageSnapshot {
    return {
      generation_calls: this.calls,
      input_tokens: this.inputTokens,
      output_tokens: this.outputTokens,
    };
  }
}
