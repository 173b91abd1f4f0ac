/**
 * Text Generation Capability
 *
 * The one blocking dependency of the engine: `generate(prompt) -> text`.
 * Components receive a `TextCapability` and never read credentials or
 * provider settings themselves.
 */

import type { BaseLLMProvider } from './providers/base.js';
import type { ChatMessage } from './types.js';
import { LLMError, LLMErrorType } from './types.js';
import { createProvider } from './factory.js';
import { ConfigError, ConfigErrorType, resolveApiKey } from '../config/env.js';
import type { Env } from '../config/env.js';
import { createModuleLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export enum ServiceErrorType {
  /**
   * No text service is configured
   */
  UNAVAILABLE = 'UNAVAILABLE',
  TIMEOUT = 'TIMEOUT',

  /**
   * The provider rejected the request or could not be reached
   */
  PROVIDER = 'PROVIDER',
  EMPTY_RESPONSE = 'EMPTY_RESPONSE',
}

export class ServiceError extends Error {
  constructor(
    public type: ServiceErrorType,
    message: string,
    public originalError?: unknown
  ) {
    super(`[TextService] ${type}: ${message}`);
    this.name = 'ServiceError';
  }
}

export interface GenerateOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface TextService {
  readonly name: string;

  /**
   * Generate text for a prompt; rejects with ServiceError
   */
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export type TextCapability =
  | { status: 'available'; service: TextService }
  | { status: 'unavailable'; reason: string };

/**
 * TextService backed by one of the LLM providers. `timeoutMs` bounds the
 * whole call, rate limiting and retries included; each HTTP attempt has the
 * provider's own, shorter timeout. Reaching it aborts the request and
 * cancels pending retries.
 */
export class LLMTextService implements TextService {
  private readonly logger: Logger;

  constructor(
    private readonly provider: BaseLLMProvider,
    private readonly timeoutMs: number
  ) {
    this.logger = createModuleLogger('llm:text-service');
  }

  get name(): string {
    return `${this.provider.name}:${this.provider.model}`;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const messages: ChatMessage[] = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const controller = new AbortController();
    const work = this.provider.createCompletion(messages, {
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      signal: controller.signal,
    });

    const response = await this.withTimeout(work, controller).catch((error: unknown) => {
      throw toServiceError(error);
    });

    const text = response.content.trim();
    if (!text) {
      throw new ServiceError(ServiceErrorType.EMPTY_RESPONSE, `${this.name} returned an empty response`);
    }
    return text;
  }

  private async withTimeout<T>(work: Promise<T>, controller: AbortController): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new ServiceError(ServiceErrorType.TIMEOUT, `No response within ${this.timeoutMs}ms`);
        void work.catch((cause: unknown) => {
          this.logger.debug('Request cancelled after timeout', {
            error: cause instanceof Error ? cause.message : String(cause),
          });
        });
        controller.abort(error);
        reject(error);
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Normalize anything a provider throws into a ServiceError
 */
export function toServiceError(error: unknown): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }

  if (error instanceof LLMError) {
    const type = error.type === LLMErrorType.TIMEOUT
      ? ServiceErrorType.TIMEOUT
      : error.type === LLMErrorType.EMPTY_RESPONSE
        ? ServiceErrorType.EMPTY_RESPONSE
        : ServiceErrorType.PROVIDER;
    return new ServiceError(type, error.message, error);
  }

  return new ServiceError(
    ServiceErrorType.PROVIDER,
    error instanceof Error ? error.message : String(error),
    error
  );
}

/**
 * Build the capability once at startup. A missing credential is reported
 * as a single warning and yields the `unavailable` variant.
 */
export function createTextCapability(
  envConfig: Env,
  providerFactory: (envConfig: Env, apiKey: string) => BaseLLMProvider = createProvider
): TextCapability {
  const logger = createModuleLogger('llm:text-service');
  const apiKey = resolveApiKey(envConfig);

  if (!apiKey) {
    const error = new ConfigError(
      ConfigErrorType.MISSING_CREDENTIAL,
      `No API key set for provider '${envConfig.LLM_PROVIDER}'; 'ai_text' fields and requirement-driven generation are disabled`
    );
    logger.warn(error.message, { provider: envConfig.LLM_PROVIDER });
    return { status: 'unavailable', reason: error.message };
  }

  try {
    const provider = providerFactory(envConfig, apiKey);
    logger.info('Text service configured', { provider: provider.name, model: provider.model });
    return {
      status: 'available',
      service: new LLMTextService(provider, envConfig.LLM_TOTAL_TIMEOUT_MS),
    };
  } catch (cause) {
    const error = new ConfigError(
      ConfigErrorType.INVALID_PROVIDER,
      cause instanceof Error ? cause.message : String(cause),
      cause
    );
    logger.warn('Could not configure text service', { error: error.message });
    return { status: 'unavailable', reason: error.message };
  }
}

/**
 * Return the service or fail the way a service call would
 */
export function requireTextService(capability: TextCapability): TextService {
  if (capability.status === 'unavailable') {
    throw new ServiceError(ServiceErrorType.UNAVAILABLE, capability.reason);
  }
  return capability.service;
}
