/**
 * Line-based prompting for the interactive commands
 */

import { createInterface } from 'node:readline/promises';
import type { Interface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export type Output = (line: string) => void;

/**
 * Prompter over stdin/stdout; the readline interface opens on first use
 */
export function createConsolePrompter(): Prompter {
  let rl: Interface | undefined;

  return {
    async ask(question: string): Promise<string> {
      rl ??= createInterface({ input: stdin, output: stdout });
      return rl.question(question);
    },
    close(): void {
      rl?.close();
      rl = undefined;
    },
  };
}

/**
 * Ask until `parse` accepts the answer
 */
export async function askUntilValid<T>(
  prompter: Prompter,
  question: string,
  parse: (answer: string) => T | undefined,
  out: Output,
  invalidMessage = '[!] Invalid input, please try again.'
): Promise<T> {
  while (true) {
    const answer = await prompter.ask(question);
    const value = parse(answer.trim());
    if (value !== undefined) {
      return value;
    }
    out(invalidMessage);
  }
}

export function parsePositiveInt(text: string): number | undefined {
  if (!/^\d+$/.test(text)) {
    return undefined;
  }
  const value = Number.parseInt(text, 10);
  return value > 0 ? value : undefined;
}

export function parseNonEmpty(text: string): string | undefined {
  return text.length > 0 ? text : undefined;
}
