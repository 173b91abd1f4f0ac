/**
 * LLM Provider Factory
 * Builds provider instances from the validated environment
 */

import type { ProviderConfig } from './types.js';
import { LLMErrorType } from './types.js';
import type { BaseLLMProvider, ProviderRuntime } from './providers/base.js';
import { GeminiProvider, GEMINI_DEFAULT_MODEL } from './providers/gemini.js';
import { OpenAIProvider, OPENAI_DEFAULT_MODEL } from './providers/openai.js';
import { AnthropicProvider, ANTHROPIC_DEFAULT_MODEL } from './providers/anthropic.js';
import type { Env, LLMProviderName } from '../config/env.js';

const DEFAULT_MODELS: Record<LLMProviderName, string> = {
  gemini: GEMINI_DEFAULT_MODEL,
  openai: OPENAI_DEFAULT_MODEL,
  anthropic: ANTHROPIC_DEFAULT_MODEL,
};

/**
 * Build a provider config from the environment and a resolved credential
 */
export function buildProviderConfig(envConfig: Env, apiKey: string): ProviderConfig {
  return {
    apiKey,
    model: envConfig.LLM_MODEL ?? DEFAULT_MODELS[envConfig.LLM_PROVIDER],
    baseUrl: envConfig.LLM_API_BASE,
    maxTokens: envConfig.LLM_MAX_TOKENS,
    temperature: envConfig.LLM_TEMPERATURE,
    timeout: envConfig.LLM_TIMEOUT_MS,
    retry: {
      maxAttempts: envConfig.LLM_MAX_RETRIES,
      initialBackoffMs: 1000,
      backoffMultiplier: 2,
      maxBackoffMs: 10000,
      jitterFactor: 0.1,
      retryableTypes: [
        LLMErrorType.RATE_LIMIT,
        LLMErrorType.SERVER_ERROR,
        LLMErrorType.NETWORK_ERROR,
        LLMErrorType.TIMEOUT,
      ],
    },
    rateLimit: {
      maxRequests: envConfig.LLM_RATE_LIMIT_PER_MINUTE,
      windowMs: 60000,
      enabled: true,
    },
  };
}

/**
 * Create a provider by name
 */
export function createProviderFromConfig(
  name: LLMProviderName,
  providerConfig: ProviderConfig,
  runtime?: ProviderRuntime
): BaseLLMProvider {
  switch (name) {
    case 'gemini':
      return new GeminiProvider(providerConfig, runtime);
    case 'openai':
      return new OpenAIProvider(providerConfig, runtime);
    case 'anthropic':
      return new AnthropicProvider(providerConfig, runtime);
  }
}

/**
 * Create the configured provider
 */
export function createProvider(envConfig: Env, apiKey: string): BaseLLMProvider {
  return createProviderFromConfig(envConfig.LLM_PROVIDER, buildProviderConfig(envConfig, apiKey));
}
