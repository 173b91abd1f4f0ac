/**
 * Structured logging utility using Pino
 * Features:
 * - JSON format by default, pretty-print on request
 * - Configurable log levels
 * - File output with rotation
 * - Credential redaction
 */

import pino from 'pino';
import { createStream, type RotatingFileStream } from 'rotating-file-stream';
import { existsSync, mkdirSync } from 'node:fs';
import { basename, dirname } from 'node:path';

/**
 * Log levels compatible with Pino
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent',
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   */
  level?: LogLevel | string;

  /**
   * Path to log file (if omitted, logs only to stdout)
   */
  file?: string;

  /**
   * Enable pretty printing through pino-pretty
   */
  pretty?: boolean;

  /**
   * Rotate the log file instead of appending to a single file
   */
  enableFileRotation?: boolean;

  /**
   * Maximum size of each log file before rotation (e.g., '10M')
   */
  maxSize?: string;

  /**
   * Maximum number of rotated log files to keep
   */
  maxFiles?: number;

  /**
   * Additional redaction paths
   */
  redactPaths?: string[];

  name?: string;
}

/**
 * Structured context attached to a log line
 */
export type LogContext = Record<string, unknown>;

const DEFAULT_REDACT_PATHS = [
  'apiKey',
  'api_key',
  'token',
  'secret',
  'authorization',
  'x-api-key',
  'x-goog-api-key',
  'headers.authorization',
  'headers["x-api-key"]',
  'headers["x-goog-api-key"]',
  'config.apiKey',
  'llm.apiKey',
  '*.apiKey',
  '*.token',
];

const VALID_LEVELS: readonly string[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

function isLevel(value: string): value is pino.LevelWithSilent {
  return VALID_LEVELS.includes(value);
}

/**
 * Map string level to Pino level
 */
function normalizeLevel(level: string | undefined): pino.LevelWithSilent {
  const normalized = (level || 'info').toLowerCase();
  return isLevel(normalized) ? normalized : 'info';
}

function createRotatingFileStream(
  filePath: string,
  maxSize: string = '10M',
  maxFiles: number = 5
): RotatingFileStream {
  const dir = dirname(filePath);

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const filename = basename(filePath) || 'test-data-forge.log';

  return createStream(filename, {
    path: dir,
    size: maxSize,
    interval: '1d',
    compress: 'gzip',
    maxFiles,
    history: `${filename}.history`,
  });
}

/**
 * Create a Pino logger with the given configuration
 */
export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const level = normalizeLevel(config.level);

  const redactPaths = [...DEFAULT_REDACT_PATHS, ...(config.redactPaths ?? [])];

  const baseOptions: pino.LoggerOptions = {
    level,
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (config.name) {
    baseOptions.name = config.name;
  }

  if (config.file && config.enableFileRotation) {
    const fileStream = createRotatingFileStream(config.file, config.maxSize, config.maxFiles);

    return pino(
      baseOptions,
      pino.multistream([{ stream: process.stdout }, { stream: fileStream }])
    );
  }

  const transports: pino.TransportTargetOptions[] = [];

  if (config.pretty) {
    transports.push({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        singleLine: false,
      },
    });
  }

  if (config.file) {
    transports.push({
      target: 'pino/file',
      options: { destination: config.file, mkdir: true },
    });
  }

  if (transports.length > 0) {
    baseOptions.transport = { targets: transports };
  }

  return pino(baseOptions);
}

/**
 * Logger class that wraps Pino: message first, structured context second
 */
export class Logger {
  private pinoInstance: pino.Logger;

  constructor(config: LoggerConfig = {}, instance?: pino.Logger) {
    this.pinoInstance = instance ?? createLogger(config);
  }

  debug(msg: string, context?: LogContext): void {
    this.pinoInstance.debug(context ?? {}, msg);
  }

  info(msg: string, context?: LogContext): void {
    this.pinoInstance.info(context ?? {}, msg);
  }

  warn(msg: string, context?: LogContext): void {
    this.pinoInstance.warn(context ?? {}, msg);
  }

  /**
   * Log an error; an Error instance is serialized under `err`
   */
  error(msg: string, context?: LogContext | Error): void {
    if (context instanceof Error) {
      this.pinoInstance.error({ err: context }, msg);
    } else {
      this.pinoInstance.error(context ?? {}, msg);
    }
  }

  setLevel(level: LogLevel | string): void {
    this.pinoInstance.level = normalizeLevel(level);
  }

  /**
   * Create a child logger with additional bindings
   */
  child(bindings: Record<string, string>): Logger {
    return new Logger({}, this.pinoInstance.child(bindings));
  }
}

/**
 * Default global logger instance, configured from the environment
 */
const globalLogger = new Logger({
  level: process.env.LOG_LEVEL || 'info',
  file: process.env.LOG_FILE,
  pretty: process.env.LOG_FORMAT === 'text',
  enableFileRotation: Boolean(process.env.LOG_FILE),
  maxSize: '10M',
  maxFiles: 5,
  name: 'test-data-forge',
});

export { globalLogger as logger };

/**
 * Create a new logger with a module name binding
 */
export function createModuleLogger(moduleName: string): Logger {
  return globalLogger.child({ module: moduleName });
}

/**
 * Apply a level to the global logger and every child created from it afterwards
 */
export function setGlobalLogLevel(level: LogLevel | string): void {
  globalLogger.setLevel(level);
}
