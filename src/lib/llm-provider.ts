import type Anthropic from '@anthropic-ai/sdk';
import { extractResponseText } from './anthropic.js';
import { withRetry } from './retry.js';
import type { Logger } from './logger.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface ChatResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

// ─── Anthropic provider ──────────────────────────────────────────────

export interface AnthropicProviderOptions {
  getClient: () => Anthropic;
  logger?: Logger;
  maxAttempts?: number;
  /** Per-call timeout; combined with the caller's signal if one is given. */
  timeoutMs?: number;
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  constructor(private readonly options: AnthropicProviderOptions) {}

  async chat(params: ChatParams): Promise<ChatResponse> {
    const client = this.options.getClient();
    const timeoutMs = this.options.timeoutMs ?? 120_000;

    const response = await withRetry(
      () => {
        const signal = params.signal
          ? AbortSignal.any([params.signal, AbortSignal.timeout(timeoutMs)])
          : AbortSignal.timeout(timeoutMs);
        return client.messages.create(
          {
            model: params.model,
            max_tokens: params.max_tokens,
            system: params.system,
            messages: params.messages,
            ...(params.temperature !== undefined && { temperature: params.temperature }),
          },
          { signal },
        );
      },
      {
        maxAttempts: this.options.maxAttempts ?? 3,
        onRetry: (attempt, error) => {
          this.options.logger?.warn({ attempt, model: params.model, error: error.message }, 'Retrying LLM call');
        },
      },
    );

    return {
      text: extractResponseText(response),
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}
