/**
 * LLM Provider Types and Interfaces
 * Shared by the Gemini, OpenAI and Anthropic provider implementations
 */

export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * A single message in a chat conversation
 */
export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * Options for a completion request; unset values fall back to the provider config
 */
export interface CompletionOptions {
  maxTokens?: number;

  /**
   * Sampling temperature (0-2)
   */
  temperature?: number;

  /**
   * Nucleus sampling parameter (0-1)
   */
  topP?: number;

  stopSequences?: string[];

  /**
   * Timeout for a single HTTP request in milliseconds
   */
  timeout?: number;

  /**
   * Cancels the in-flight request and any retries still pending
   */
  signal?: AbortSignal;
}

export interface UsageStats {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Response from a completion request
 */
export interface CompletionResponse {
  /**
   * The generated text content
   */
  content: string;

  /**
   * The model that produced the response
   */
  model: string;

  usage?: UsageStats;

  metadata?: Record<string, unknown>;

  provider: string;
}

/**
 * Error types for LLM operations
 */
export enum LLMErrorType {
  AUTHENTICATION = 'AUTHENTICATION',
  RATE_LIMIT = 'RATE_LIMIT',
  INVALID_REQUEST = 'INVALID_REQUEST',
  SERVER_ERROR = 'SERVER_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',

  /**
   * The provider answered but returned no usable text
   */
  EMPTY_RESPONSE = 'EMPTY_RESPONSE',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Error raised by a provider; `isRetryable` overrides the retry policy's type list
 */
export class LLMError extends Error {
  constructor(
    public type: LLMErrorType,
    public provider: string,
    message: string,
    public originalError?: unknown,
    public isRetryable: boolean = false
  ) {
    super(`[${provider}] ${type}: ${message}`);
    this.name = 'LLMError';
  }
}

/**
 * Configuration for retry logic
 */
export interface RetryConfig {
  maxAttempts: number;
  initialBackoffMs: number;

  /**
   * Multiplier for exponential backoff
   */
  backoffMultiplier: number;
  maxBackoffMs: number;

  /**
   * Jitter factor applied to each delay (0-1)
   */
  jitterFactor: number;

  /**
   * Error types that should be retried
   */
  retryableTypes: LLMErrorType[];
}

/**
 * Sliding-window rate limit
 */
export interface RateLimitConfig {
  maxRequests: number;
  windowMs: number;
  enabled: boolean;
}

/**
 * Provider configuration
 */
export interface ProviderConfig {
  apiKey: string;
  model: string;

  /**
   * Base URL for API requests; each provider has its own default
   */
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;

  /**
   * Default request timeout in milliseconds
   */
  timeout?: number;
  retry?: Partial<RetryConfig>;
  rateLimit?: Partial<RateLimitConfig>;
}
