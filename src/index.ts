/**
 * Test Data Forge
 *
 * Synthetic tabular test data from a field schema or from a plain-language
 * requirement, using deterministic fakers and an optional text-generation service.
 */

export { DataForge, VERSION, createDataForge } from './core/index.js';
export type {
  DataForgeOptions,
  PipelineState,
  RequirementPipelineRequest,
  RequirementPipelineResult,
  RowsPerScenarioChoice,
  SchemaPipelineRequest,
  SchemaPipelineResult,
} from './core/index.js';

// Configuration
export { ConfigError, ConfigErrorType, config, parseEnv, resolveApiKey } from './config/env.js';
export type { DataLocale, Env, LLMProviderName } from './config/env.js';

// Logging
export { Logger, LogLevel, createModuleLogger, logger, setGlobalLogLevel } from './utils/logger.js';
export type { LogContext, LoggerConfig } from './utils/logger.js';

// Text service and providers
export * from './llm/index.js';

// Services
export * from './services/data-factory/index.js';
export * from './services/test-strategist/index.js';
export * from './services/export/index.js';
