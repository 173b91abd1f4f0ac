/**
 * Anthropic LLM Provider Implementation
 * Calls the Messages API
 */

import { z } from 'zod';
import { BaseLLMProvider } from './base.js';
import type { ProviderRuntime, ResolvedCompletionOptions } from './base.js';
import type { ChatMessage, CompletionResponse, ProviderConfig } from '../types.js';

export const ANTHROPIC_DEFAULT_MODEL = 'claude-3-5-haiku-latest';

const ANTHROPIC_API_VERSION = '2023-06-01';

const anthropicResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

export class AnthropicProvider extends BaseLLMProvider {
  private readonly baseUrl: string;

  constructor(config: ProviderConfig, runtime?: ProviderRuntime) {
    super(config, 'anthropic', runtime);
    this.baseUrl = config.baseUrl || 'https://api.anthropic.com/v1';
  }

  get name(): string {
    return 'anthropic';
  }

  protected async requestCompletion(
    messages: ChatMessage[],
    options: ResolvedCompletionOptions
  ): Promise<CompletionResponse> {
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const raw = await this.postJson(
      `${this.baseUrl}/messages`,
      {
        'x-api-key': this.config.apiKey,
        'anthropic-version': ANTHROPIC_API_VERSION,
      },
      {
        model: this.config.model,
        system: system || undefined,
        messages: messages
          .filter((m) => m.role !== 'system')
          .map((m) => ({ role: m.role, content: m.content })),
        max_tokens: options.maxTokens,
        temperature: Math.min(options.temperature, 1),
        top_p: options.topP,
        stop_sequences: options.stopSequences.length > 0 ? options.stopSequences : undefined,
      },
      options.timeout,
      options.signal
    );

    const parsed = anthropicResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.emptyResponse('Unexpected response shape');
    }

    const text = parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');

    if (!text) {
      throw this.emptyResponse('No text content returned');
    }

    const usage = parsed.data.usage;

    return {
      content: text,
      model: parsed.data.model,
      usage: usage
        ? {
            promptTokens: usage.input_tokens,
            completionTokens: usage.output_tokens,
            totalTokens: usage.input_tokens + usage.output_tokens,
          }
        : undefined,
      metadata: {
        id: parsed.data.id,
        stopReason: parsed.data.stop_reason,
      },
      provider: this.name,
    };
  }
}
