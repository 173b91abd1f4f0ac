/**
 * Gemini LLM Provider Implementation
 * Calls the Generative Language API `generateContent` endpoint
 */

import { z } from 'zod';
import { BaseLLMProvider } from './base.js';
import type { ProviderRuntime, ResolvedCompletionOptions } from './base.js';
import type { ChatMessage, CompletionResponse, ProviderConfig } from '../types.js';

export const GEMINI_DEFAULT_MODEL = 'gemini-1.5-flash';

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .default([]),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().default(0),
      candidatesTokenCount: z.number().default(0),
      totalTokenCount: z.number().default(0),
    })
    .optional(),
  modelVersion: z.string().optional(),
});

export class GeminiProvider extends BaseLLMProvider {
  private readonly baseUrl: string;

  constructor(config: ProviderConfig, runtime?: ProviderRuntime) {
    super(config, 'gemini', runtime);
    this.baseUrl = config.baseUrl || 'https://generativelanguage.googleapis.com/v1beta';
  }

  get name(): string {
    return 'gemini';
  }

  protected async requestCompletion(
    messages: ChatMessage[],
    options: ResolvedCompletionOptions
  ): Promise<CompletionResponse> {
    // Gemini takes system text separately and calls the assistant role "model"
    const systemText = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const body: Record<string, unknown> = {
      contents: messages
        .filter((m) => m.role !== 'system')
        .map((m) => ({
          role: m.role === 'assistant' ? 'model' : 'user',
          parts: [{ text: m.content }],
        })),
      generationConfig: {
        maxOutputTokens: options.maxTokens,
        temperature: options.temperature,
        topP: options.topP,
        stopSequences: options.stopSequences.length > 0 ? options.stopSequences : undefined,
      },
    };

    if (systemText) {
      body.systemInstruction = { parts: [{ text: systemText }] };
    }

    const raw = await this.postJson(
      `${this.baseUrl}/models/${encodeURIComponent(this.config.model)}:generateContent`,
      { 'x-goog-api-key': this.config.apiKey },
      body,
      options.timeout,
      options.signal
    );

    const parsed = geminiResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.emptyResponse('Unexpected response shape');
    }

    const candidate = parsed.data.candidates[0];
    const text = candidate?.content?.parts.map((p) => p.text ?? '').join('') ?? '';

    if (!text) {
      throw this.emptyResponse(`No text returned (finishReason: ${candidate?.finishReason ?? 'none'})`);
    }

    const usage = parsed.data.usageMetadata;

    return {
      content: text,
      model: parsed.data.modelVersion ?? this.config.model,
      usage: usage
        ? {
            promptTokens: usage.promptTokenCount,
            completionTokens: usage.candidatesTokenCount,
            totalTokens: usage.totalTokenCount,
          }
        : undefined,
      metadata: { finishReason: candidate?.finishReason },
      provider: this.name,
    };
  }
}
