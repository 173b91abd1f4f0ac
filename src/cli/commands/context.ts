/**
 * Shared wiring for CLI commands
 */

import type { DataForge } from '../../core/index.js';
import { createDataForge } from '../../core/index.js';
import { createConsolePrompter } from '../prompter.js';
import type { Output, Prompter } from '../prompter.js';

export interface CommandContext {
  forge: DataForge;
  prompter: Prompter;
  out: Output;
  err: Output;
}

export function createCommandContext(overrides: Partial<CommandContext> = {}): CommandContext {
  return {
    forge: overrides.forge ?? createDataForge(),
    prompter: overrides.prompter ?? createConsolePrompter(),
    out: overrides.out ?? ((line: string) => console.log(line)),
    err: overrides.err ?? ((line: string) => console.error(line)),
  };
}
