/**
 * Command dispatch for the test-data-forge CLI
 */

import { VERSION } from '../core/index.js';
import { setGlobalLogLevel } from '../utils/logger.js';
import type { Output } from './prompter.js';
import { createCommandContext } from './commands/context.js';
import type { CommandContext } from './commands/context.js';
import { executeGenerateCommand } from './commands/generate.js';
import { executeStrategizeCommand } from './commands/strategize.js';

export interface CliRuntime {
  /**
   * Builds the command context on first use, so help and version never touch the engine
   */
  createContext?: () => CommandContext;
  out?: Output;
}

/**
 * Display main CLI help
 */
export function displayMainHelp(out: Output): void {
  out(`
Test Data Forge v${VERSION}
================

Synthetic test data from a schema or from a plain-language requirement.

Usage:
  test-data-forge <command> [options]

Commands:
  generate                Generate rows for a schema (file or interactive)
  strategize              Plan scenarios for a requirement and generate rows for each

Options:
  -v, --verbose           Enable debug logging
  -V, --version           Print the version
  -h, --help              Show this help message

Examples:
  test-data-forge generate -s examples/user-schema.json -r 10 -c mixed -o users
  test-data-forge strategize -q "a login form with email and password" -r ideal -o login

For more information on a specific command, use:
  test-data-forge <command> --help
`);
}

/**
 * Run the CLI; resolves to the process exit code
 */
export async function runCli(argv: readonly string[], runtime: CliRuntime = {}): Promise<number> {
  const out = runtime.out ?? ((line: string) => console.log(line));
  const createContext = runtime.createContext ?? (() => createCommandContext());

  const verbose = argv.includes('--verbose') || argv.includes('-v');
  const args = argv.filter((arg) => arg !== '--verbose' && arg !== '-v');

  if (verbose) {
    setGlobalLogLevel('debug');
  }

  const [command, ...rest] = args;

  switch (command) {
    case 'generate':
      return executeGenerateCommand(rest, createContext());

    case 'strategize':
      return executeStrategizeCommand(rest, createContext());

    case '-V':
    case '--version':
      out(VERSION);
      return 0;

    case undefined:
    case '-h':
    case '--help':
      displayMainHelp(out);
      return 0;

    default:
      out(`Unknown command '${command}'`);
      displayMainHelp(out);
      return 1;
  }
}
