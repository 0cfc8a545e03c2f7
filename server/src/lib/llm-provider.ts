import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  tools?: ToolDef[];
  tool_choice?: { type: 'any' } | { type: 'auto' } | { type: 'tool'; name: string };
  max_tokens: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ToolDef {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
}

export interface ChatResponse {
  text: string;
  tool_calls: ToolCall[];
  usage: TokenUsage;
}

export interface ToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const onCallerAbort = () => {
    if (!controller.signal.aborted) controller.abort(callerSignal?.reason);
  };

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };

  return { signal: controller.signal, cleanup };
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic | null = null;

  constructor(private readonly options: { apiKey: string; timeoutMs: number }) {}

  /** Lazily create the SDK client so construction never touches the network. */
  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.options.apiKey, maxRetries: 0 });
    }
    return this.client;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const { signal, cleanup } = createCombinedAbortSignal(params.signal, this.options.timeoutMs);
    try {
      const response = await this.getClient().messages.create(
        {
          model: params.model,
          max_tokens: params.max_tokens,
          system: params.system,
          messages: params.messages,
          ...(params.temperature !== undefined && { temperature: params.temperature }),
          ...(params.tools && params.tools.length > 0 && {
            tools: params.tools.map((t) => ({
              name: t.name,
              description: t.description,
              input_schema: { ...t.input_schema, type: 'object' as const },
            })),
          }),
          ...(params.tool_choice && { tool_choice: params.tool_choice }),
        },
        { signal },
      );

      let text = '';
      const tool_calls: ToolCall[] = [];
      for (const block of response.content) {
        if (block.type === 'text') {
          text += block.text;
        } else if (block.type === 'tool_use' && isRecord(block.input)) {
          tool_calls.push({ id: block.id, name: block.name, input: block.input });
        }
      }

      return {
        text,
        tool_calls,
        usage: {
          input_tokens: response.usage?.input_tokens ?? 0,
          output_tokens: response.usage?.output_tokens ?? 0,
        },
      };
    } finally {
      cleanup();
    }
  }
}

// ─── OpenAI-compatible provider (Z.AI, Ollama) ───────────────────────

const OpenAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullish(),
      tool_calls: z.array(z.object({
        id: z.string(),
        function: z.object({ name: z.string(), arguments: z.string() }),
      })).nullish(),
    }).optional(),
  })).optional(),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).nullish(),
});

type OpenAIChatResponse = z.infer<typeof OpenAIChatResponseSchema>;

interface OpenAICompatibleConfig {
  name: string;
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name: string;
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: OpenAICompatibleConfig) {
    this.name = config.name;
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const { signal, cleanup } = createCombinedAbortSignal(params.signal, this.timeoutMs);
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
        },
        body: JSON.stringify(this.buildRequestBody(params)),
        signal,
      });

      if (!response.ok) {
        const errText = await response.text().catch(() => '');
        throw Object.assign(
          new Error(`${this.name} API error ${response.status}: ${errText.slice(0, 500)}`),
          { status: response.status },
        );
      }

      const parsed = OpenAIChatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`${this.name} API returned an unexpected response shape`);
      }
      return this.parseResponse(parsed.data);
    } finally {
      cleanup();
    }
  }

  private buildRequestBody(params: ChatParams): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: params.model,
      max_tokens: params.max_tokens,
      messages: [
        { role: 'system', content: params.system },
        ...params.messages.map((m) => ({ role: m.role, content: m.content })),
      ],
      stream: false,
    };

    if (params.temperature !== undefined) {
      body.temperature = params.temperature;
    }

    if (params.tools && params.tools.length > 0) {
      body.tools = params.tools.map((t) => ({
        type: 'function',
        function: {
          name: t.name,
          description: t.description,
          parameters: { ...t.input_schema, type: 'object' },
        },
      }));
    }

    if (params.tool_choice) {
      if (params.tool_choice.type === 'tool') {
        body.tool_choice = { type: 'function', function: { name: params.tool_choice.name } };
      } else {
        body.tool_choice = params.tool_choice.type === 'any' ? 'required' : 'auto';
      }
    }

    return body;
  }

  private parseResponse(data: OpenAIChatResponse): ChatResponse {
    const message = data.choices?.[0]?.message;
    const tool_calls: ToolCall[] = [];

    for (const tc of message?.tool_calls ?? []) {
      // Unparseable tool arguments are dropped; the caller then falls back to text.
      let input: unknown = null;
      try {
        input = JSON.parse(tc.function.arguments);
      } catch {
        input = null;
      }
      if (isRecord(input)) {
        tool_calls.push({ id: tc.id, name: tc.function.name, input });
      }
    }

    return {
      text: message?.content ?? '',
      tool_calls,
      usage: {
        input_tokens: data.usage?.prompt_tokens ?? 0,
        output_tokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}
