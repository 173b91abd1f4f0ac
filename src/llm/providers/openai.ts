/**
 * OpenAI LLM Provider Implementation
 * Works against OpenAI and OpenAI-compatible chat completion APIs
 */

import { z } from 'zod';
import { BaseLLMProvider } from './base.js';
import type { ProviderRuntime, ResolvedCompletionOptions } from './base.js';
import type { ChatMessage, CompletionResponse, ProviderConfig } from '../types.js';

export const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';

const openAIResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string(),
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string(),
        content: z.string().nullable(),
      }),
      finish_reason: z.string().nullable().optional(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export class OpenAIProvider extends BaseLLMProvider {
  private readonly baseUrl: string;

  constructor(config: ProviderConfig, runtime?: ProviderRuntime) {
    super(config, 'openai', runtime);
    this.baseUrl = config.baseUrl || 'https://api.openai.com/v1';
  }

  get name(): string {
    return 'openai';
  }

  protected async requestCompletion(
    messages: ChatMessage[],
    options: ResolvedCompletionOptions
  ): Promise<CompletionResponse> {
    const raw = await this.postJson(
      `${this.baseUrl}/chat/completions`,
      { Authorization: `Bearer ${this.config.apiKey}` },
      {
        model: this.config.model,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        top_p: options.topP,
        stop: options.stopSequences.length > 0 ? options.stopSequences : undefined,
      },
      options.timeout,
      options.signal
    );

    const parsed = openAIResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.emptyResponse('Unexpected response shape');
    }

    const choice = parsed.data.choices[0];
    if (!choice?.message.content) {
      throw this.emptyResponse('No choices returned in response');
    }

    const usage = parsed.data.usage;

    return {
      content: choice.message.content,
      model: parsed.data.model,
      usage: usage
        ? {
            promptTokens: usage.prompt_tokens,
            completionTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens,
          }
        : undefined,
      metadata: {
        id: parsed.data.id,
        finishReason: choice.finish_reason,
      },
      provider: this.name,
    };
  }
}
