/**
 * Base LLM Provider
 * Common request plumbing for all providers: rate limiting, retries,
 * timeouts and HTTP status mapping
 */

import type {
  ChatMessage,
  CompletionOptions,
  CompletionResponse,
  ProviderConfig,
} from '../types.js';
import { LLMError, LLMErrorType } from '../types.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { RetryManager } from '../retry.js';
import type { Sleep } from '../retry.js';
import { RateLimiter } from '../rate-limiter.js';

export type ResolvedCompletionOptions = Required<Omit<CompletionOptions, 'signal'>> & {
  signal?: AbortSignal;
};

/**
 * Hooks that tests use to avoid real waiting
 */
export interface ProviderRuntime {
  sleep?: Sleep;
}

export abstract class BaseLLMProvider {
  protected readonly config: ProviderConfig;
  protected readonly logger: Logger;
  protected readonly retryManager: RetryManager;
  protected readonly rateLimiter: RateLimiter;

  constructor(config: ProviderConfig, providerName: string, runtime: ProviderRuntime = {}) {
    this.config = config;
    this.logger = createModuleLogger(`llm:${providerName}`);
    this.retryManager = new RetryManager(config.retry, this.logger, runtime.sleep);
    this.rateLimiter = new RateLimiter(config.rateLimit, this.logger, { sleep: runtime.sleep });
  }

  abstract get name(): string;

  get model(): string {
    return this.config.model;
  }

  /**
   * Perform a single completion request against the provider API
   */
  protected abstract requestCompletion(
    messages: ChatMessage[],
    options: ResolvedCompletionOptions
  ): Promise<CompletionResponse>;

  /**
   * Create a completion, rate limited and retried on transient failures
   */
  async createCompletion(
    messages: ChatMessage[],
    options?: CompletionOptions
  ): Promise<CompletionResponse> {
    const resolvedOptions = this.resolveOptions(options);
    const signal = resolvedOptions.signal;

    await this.rateLimiter.acquireSlot();
    signal?.throwIfAborted();

    return this.retryManager.execute(async () => {
      const startTime = Date.now();
      try {
        const response = await this.requestCompletion(messages, resolvedOptions);
        this.logger.debug('Completion received', {
          model: response.model,
          totalTokens: response.usage?.totalTokens,
          responseTimeMs: Date.now() - startTime,
        });
        return response;
      } catch (error) {
        throw this.handleError(error);
      }
    }, `${this.name}.createCompletion`, signal);
  }

  /**
   * POST a JSON body and return the decoded JSON response
   */
  protected async postJson(
    url: string,
    headers: Record<string, string>,
    body: Record<string, unknown>,
    timeout: number,
    signal?: AbortSignal
  ): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const cancel = (): void => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener('abort', cancel, { once: true });

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...headers,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => '');
        throw this.createErrorFromStatus(response.status, this.extractErrorMessage(errorText));
      }

      return await response.json();
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', cancel);
    }
  }

  /**
   * Map an HTTP status to an LLMError
   */
  protected createErrorFromStatus(status: number, message: string | undefined): LLMError {
    const text = message || `HTTP ${status}`;

    switch (status) {
      case 401:
      case 403:
        return new LLMError(LLMErrorType.AUTHENTICATION, this.name, text);

      case 429:
        return new LLMError(LLMErrorType.RATE_LIMIT, this.name, text, undefined, true);

      case 400:
      case 404:
        return new LLMError(LLMErrorType.INVALID_REQUEST, this.name, text);

      case 500:
      case 502:
      case 503:
      case 504:
        return new LLMError(LLMErrorType.SERVER_ERROR, this.name, text, undefined, true);

      default:
        return new LLMError(LLMErrorType.UNKNOWN, this.name, text);
    }
  }

  /**
   * Convert anything thrown during a request into an LLMError
   */
  protected handleError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    if (error instanceof Error) {
      if (error.name === 'AbortError' || error.message.toLowerCase().includes('timeout')) {
        return new LLMError(LLMErrorType.TIMEOUT, this.name, error.message, error, true);
      }

      if (error.message.includes('fetch') || error.message.includes('network')) {
        return new LLMError(LLMErrorType.NETWORK_ERROR, this.name, error.message, error, true);
      }

      return new LLMError(LLMErrorType.UNKNOWN, this.name, error.message, error);
    }

    return new LLMError(LLMErrorType.UNKNOWN, this.name, String(error));
  }

  protected emptyResponse(detail: string): LLMError {
    return new LLMError(LLMErrorType.EMPTY_RESPONSE, this.name, detail);
  }

  protected resolveOptions(options?: CompletionOptions): ResolvedCompletionOptions {
    return {
      maxTokens: options?.maxTokens ?? this.config.maxTokens ?? 2000,
      temperature: options?.temperature ?? this.config.temperature ?? 0.7,
      topP: options?.topP ?? 1.0,
      stopSequences: options?.stopSequences ?? [],
      timeout: options?.timeout ?? this.config.timeout ?? 30000,
      signal: options?.signal,
    };
  }

  /**
   * Pull `error.message` out of a provider error body, if it is JSON
   */
  private extractErrorMessage(body: string): string | undefined {
    if (!body) {
      return undefined;
    }
    try {
      const parsed: unknown = JSON.parse(body);
      if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
        const inner = parsed.error;
        if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
          return inner.message;
        }
      }
    } catch {
      return body.slice(0, 200);
    }
    return body.slice(0, 200);
  }
}
