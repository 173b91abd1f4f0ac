/**
 * LLM Module Main Entry Point
 */

export type {
  ChatMessage,
  CompletionOptions,
  CompletionResponse,
  UsageStats,
  ProviderConfig,
  RetryConfig,
  RateLimitConfig,
} from './types.js';

export { LLMError, LLMErrorType } from './types.js';

export { BaseLLMProvider } from './providers/base.js';
export type { ProviderRuntime } from './providers/base.js';
export { GeminiProvider } from './providers/gemini.js';
export { OpenAIProvider } from './providers/openai.js';
export { AnthropicProvider } from './providers/anthropic.js';

export { RetryManager } from './retry.js';
export { RateLimiter } from './rate-limiter.js';

export { buildProviderConfig, createProvider, createProviderFromConfig } from './factory.js';

export {
  LLMTextService,
  ServiceError,
  ServiceErrorType,
  createTextCapability,
  requireTextService,
  toServiceError,
} from './text-service.js';
export type { GenerateOptions, TextCapability, TextService } from './text-service.js';
