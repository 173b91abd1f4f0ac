import dotenv from "dotenv";
import { z } from "zod";

// Load environment variables from .env file
// Priority: .env.<env>.local > .env.<env> > .env.local > .env
const env = process.env.NODE_ENV || "development";
const envFiles = [
  `.env.${env}.local`,
  `.env.${env}`,
  ".env.local",
  ".env",
];

for (const file of envFiles) {
  dotenv.config({ path: file });
}

const optionalKey = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

// Define the environment variable schema
const envSchema = z
  .object({
    // Application
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),

    // LLM Configuration
    LLM_PROVIDER: z.enum(["gemini", "openai", "anthropic"]).default("gemini"),
    LLM_API_KEY: optionalKey,
    GEMINI_API_KEY: optionalKey,
    OPENAI_API_KEY: optionalKey,
    ANTHROPIC_API_KEY: optionalKey,
    LLM_MODEL: z.string().optional(),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    LLM_API_BASE: z.string().url().optional(),
    // Per HTTP attempt; the total covers rate limiting and every retry
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
    LLM_TOTAL_TIMEOUT_MS: z.coerce.number().int().positive().default(180000),
    LLM_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
    LLM_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),

    // Data Generation
    DATA_LOCALE: z.enum(["en", "en_US", "en_GB", "en_IN", "de", "fr"]).default("en_IN"),
    DATA_SEED: z.coerce.number().int().optional(),
    DEFAULT_ROWS_PER_SCENARIO: z.coerce.number().int().positive().default(3),
    MAX_ROWS_PER_SCENARIO: z.coerce.number().int().positive().default(50),
    SCENARIO_CONCURRENCY: z.coerce.number().int().positive().default(1),

    // Logging Configuration
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
    LOG_FILE: z.string().optional(),
    LOG_FORMAT: z.enum(["json", "text"]).default("json"),
  });

// Type for validated environment variables
export type Env = z.infer<typeof envSchema>;

export type LLMProviderName = Env["LLM_PROVIDER"];

export type DataLocale = Env["DATA_LOCALE"];

// Parse and validate environment variables
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formattedErrors: string[] = [];

    for (const issue of result.error.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "unknown";
      formattedErrors.push(`  - ${path}: ${issue.message}`);
    }

    const errors = formattedErrors.length > 0 ? formattedErrors.join("\n") : "  - Unknown validation error";

    throw new Error(
      `Environment variable validation failed:\n${errors}\n\n` +
        `Please check your .env file or set the required environment variables.`
    );
  }

  return result.data;
}

/**
 * Resolve the credential for the configured provider.
 * A provider-specific key wins over the generic LLM_API_KEY.
 */
export function resolveApiKey(envConfig: Env): string | undefined {
  switch (envConfig.LLM_PROVIDER) {
    case "gemini":
      return envConfig.GEMINI_API_KEY ?? envConfig.LLM_API_KEY;
    case "openai":
      return envConfig.OPENAI_API_KEY ?? envConfig.LLM_API_KEY;
    case "anthropic":
      return envConfig.ANTHROPIC_API_KEY ?? envConfig.LLM_API_KEY;
  }
}

// Export validated configuration
export const config = parseEnv();

/**
 * Error types for configuration problems
 */
export enum ConfigErrorType {
  MISSING_CREDENTIAL = 'MISSING_CREDENTIAL',
  INVALID_PROVIDER = 'INVALID_PROVIDER',
}

/**
 * Raised (or reported as a warning) when configuration is incomplete.
 * A missing credential only disables the features that need the LLM.
 */
export class ConfigError extends Error {
  constructor(
    public type: ConfigErrorType,
    message: string,
    public originalError?: unknown
  ) {
    super(`[Config] ${type}: ${message}`);
    this.name = 'ConfigError';
  }
}
