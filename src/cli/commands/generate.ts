/**
 * CLI Command: Generate
 * Schema-driven data generation, from a schema file or the interactive builder
 */

import { loadSchemaFile } from '../../services/data-factory/schema.js';
import { CASE_KINDS, SchemaError } from '../../services/data-factory/types.js';
import type { CaseKind, Schema } from '../../services/data-factory/types.js';
import { datasetToTable } from '../../services/export/table.js';
import { resolveOutputPaths, writeDelimitedFile } from '../../services/export/delimited-writer.js';
import { buildSchemaInteractively } from '../interactive-schema.js';
import { askUntilValid, parseNonEmpty, parsePositiveInt } from '../prompter.js';
import type { CommandContext } from './context.js';

/**
 * Display help for the generate command
 */
export function displayGenerateHelp(out: (line: string) => void): void {
  out(`
Generate Test Data
==================

Generates rows of synthetic data for a schema. Any option left out is asked for
interactively; without --schema the schema is built field by field.

Usage:
  test-data-forge generate [options]

Options:
  -s, --schema <file>     JSON schema definition
  -r, --rows <n>          Number of rows to generate
  -c, --case <kind>       positive, negative or mixed
  -o, --output <name>     Output CSV file name
  -h, --help              Show this help message

Schema file layouts:
  { "fields": [ { "name": "email", "type": "email" } ] }
  { "fields": { "bio": { "type": "ai_text", "context": "a short user bio" } } }

Examples:
  test-data-forge generate
  test-data-forge generate -s examples/user-schema.json -r 20 -c mixed -o users
`);
}

export interface GenerateCommandArgs {
  schemaPath?: string;
  rows?: number;
  casePolicy?: CaseKind;
  output?: string;
  help: boolean;
  errors: string[];
}

export function parseCaseKind(value: string): CaseKind | undefined {
  const normalized = value.trim().toLowerCase();
  return CASE_KINDS.find((kind) => kind === normalized);
}

export function parseGenerateArgs(args: readonly string[]): GenerateCommandArgs {
  const parsed: GenerateCommandArgs = { help: false, errors: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        parsed.help = true;
        break;

      case '-s':
      case '--schema': {
        const value = args[++i];
        if (value) {
          parsed.schemaPath = value;
        } else {
          parsed.errors.push(`${arg} needs a file path`);
        }
        break;
      }

      case '-r':
      case '--rows': {
        const value = parsePositiveInt(args[++i] ?? '');
        if (value !== undefined) {
          parsed.rows = value;
        } else {
          parsed.errors.push(`${arg} needs a positive integer`);
        }
        break;
      }

      case '-c':
      case '--case': {
        const value = parseCaseKind(args[++i] ?? '');
        if (value) {
          parsed.casePolicy = value;
        } else {
          parsed.errors.push(`${arg} must be one of: ${CASE_KINDS.join(', ')}`);
        }
        break;
      }

      case '-o':
      case '--output': {
        const value = args[++i];
        if (value) {
          parsed.output = value;
        } else {
          parsed.errors.push(`${arg} needs a file name`);
        }
        break;
      }

      default:
        parsed.errors.push(`Unknown option '${arg ?? ''}'`);
        break;
    }
  }

  return parsed;
}

/**
 * Execute the generate command; resolves to the process exit code
 */
export async function executeGenerateCommand(args: readonly string[], ctx: CommandContext): Promise<number> {
  const parsed = parseGenerateArgs(args);
  const { forge, prompter, out, err } = ctx;

  if (parsed.help) {
    displayGenerateHelp(out);
    return 0;
  }
  if (parsed.errors.length > 0) {
    parsed.errors.forEach((message) => err(`Error: ${message}`));
    return 1;
  }

  try {
    let schema: Schema;
    if (parsed.schemaPath) {
      schema = await loadSchemaFile(parsed.schemaPath);
      out(`[+] Loaded schema with ${schema.size} fields from '${parsed.schemaPath}'`);
    } else {
      schema = await buildSchemaInteractively(prompter, forge.registry, forge.capability, out);
    }

    if (parsed.rows === undefined || parsed.casePolicy === undefined || parsed.output === undefined) {
      out('');
      out('--- Generation Options ---');
    }

    const rows = parsed.rows ?? await askUntilValid(
      prompter,
      'How many rows of data do you want to generate? ',
      parsePositiveInt,
      out
    );

    const casePolicy = parsed.casePolicy ?? await askUntilValid(
      prompter,
      'Select test type (1: positive, 2: negative, 3: mixed): ',
      (answer) => {
        const index = parsePositiveInt(answer);
        return index !== undefined ? CASE_KINDS[index - 1] : parseCaseKind(answer);
      },
      out
    );

    const output = parsed.output ?? await askUntilValid(
      prompter,
      'Enter a name for the output CSV file: ',
      parseNonEmpty,
      out
    );

    out('');
    out(`[*] Generating ${rows} '${casePolicy}' records...`);

    const { status, result } = await forge.runSchemaPipeline({
      schema,
      rowCount: rows,
      casePolicy,
      onRow: (row, total) => out(`  - Generating row ${row + 1}/${total}`),
    });

    if (status === 'failed') {
      err('[!] No data was generated.');
      return 1;
    }

    const path = resolveOutputPaths(output).single;
    await writeDelimitedFile(path, datasetToTable(result.dataset));

    out('');
    out(`[+] Success! Data saved to '${path}'`);
    if (result.issues.length > 0) {
      out(`[!] ${result.issues.length} values could not be generated and hold an error marker.`);
    }
    return 0;
  } catch (error) {
    if (error instanceof SchemaError) {
      err(`[!] ERROR: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    prompter.close();
  }
}
