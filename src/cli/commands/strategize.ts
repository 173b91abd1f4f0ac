/**
 * CLI Command: Strategize
 * Requirement-driven generation: plan, rows per scenario, two reports
 */

import { PlanError } from '../../services/test-strategist/types.js';
import { resolveOutputPaths, writeDelimitedFile } from '../../services/export/delimited-writer.js';
import { askUntilValid, parseNonEmpty, parsePositiveInt } from '../prompter.js';
import type { CommandContext } from './context.js';
import type { RowsPerScenarioChoice } from '../../core/index.js';

const REQUIREMENT_PROMPT = "Enter your user requirement (e.g., 'a login form with email and password'):\n> ";

/**
 * Display help for the strategize command
 */
export function displayStrategizeHelp(out: (line: string) => void): void {
  out(`
AI Test Strategist
==================

Turns a plain-language requirement into a test plan, then generates rows for
every scenario in it. Needs a configured text service (see LLM_PROVIDER).

Usage:
  test-data-forge strategize [options]

Options:
  -q, --requirement <text>  The requirement to plan for
  -r, --rows <n|ideal>      Rows per scenario, or 'ideal' to let the service decide
  -o, --output <name>       Base name for the two output CSV files
  -h, --help                Show this help message

Outputs:
  <name>_full_report.csv    scenario_name and test_type first, then the data
  <name>_data_only.csv      the data columns only

Examples:
  test-data-forge strategize
  test-data-forge strategize -q "a signup form with email and age" -r ideal -o signup
`);
}

export interface StrategizeCommandArgs {
  requirement?: string;

  /**
   * Raw --rows text; resolved after parsing so an invalid value can fall back
   */
  rows?: string;
  output?: string;
  help: boolean;
  errors: string[];
}

/**
 * 'ideal' (or 'auto'/'ai') asks the advisor; undefined means the text is unusable
 */
export function parseRowsChoice(text: string): RowsPerScenarioChoice | undefined {
  const normalized = text.trim().toLowerCase();
  if (normalized === 'ideal' || normalized === 'auto' || normalized === 'ai') {
    return 'ideal';
  }
  return parsePositiveInt(normalized);
}

export function parseStrategizeArgs(args: readonly string[]): StrategizeCommandArgs {
  const parsed: StrategizeCommandArgs = { help: false, errors: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        parsed.help = true;
        break;

      case '-q':
      case '--requirement': {
        const value = args[++i]?.trim();
        if (value) {
          parsed.requirement = value;
        } else {
          parsed.errors.push(`${arg} needs a requirement text`);
        }
        break;
      }

      case '-r':
      case '--rows': {
        const value = args[++i];
        if (value) {
          parsed.rows = value;
        } else {
          parsed.errors.push(`${arg} needs a number or 'ideal'`);
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
 * Execute the strategize command; resolves to the process exit code
 */
export async function executeStrategizeCommand(args: readonly string[], ctx: CommandContext): Promise<number> {
  const parsed = parseStrategizeArgs(args);
  const { forge, prompter, out, err } = ctx;

  if (parsed.help) {
    displayStrategizeHelp(out);
    return 0;
  }
  if (parsed.errors.length > 0) {
    parsed.errors.forEach((message) => err(`Error: ${message}`));
    return 1;
  }

  try {
    out('--- AI-Powered Test Strategist ---');

    const requirement = parsed.requirement ?? await askUntilValid(
      prompter,
      REQUIREMENT_PROMPT,
      parseNonEmpty,
      out,
      '[!] Input cannot be empty. Please try again.'
    );

    out('');
    out('[*] Generating test plan from your requirement...');

    // Rows and the output name are asked only once a plan exists
    let output = parsed.output ?? '';

    const run = await forge.runRequirementPipeline({
      requirement,
      rowsPerScenario: async (plan) => {
        out(`[+] Test plan generated with ${plan.scenarios.length} scenarios.`);

        const rowsText = parsed.rows ?? await askUntilValid(
          prompter,
          "\nHow many rows of data per scenario? (e.g., 5 or type 'ideal'): ",
          parseNonEmpty,
          out,
          '[!] Input cannot be empty. Please try again.'
        );

        let choice = parseRowsChoice(rowsText);
        if (choice === undefined) {
          choice = forge.env.DEFAULT_ROWS_PER_SCENARIO;
          out(`[!] Invalid number, defaulting to ${choice}.`);
        }

        if (!output) {
          output = await askUntilValid(
            prompter,
            'Enter a base name for the output CSV file: ',
            parseNonEmpty,
            out,
            '[!] Input cannot be empty. Please try again.'
          );
        }
        return choice;
      },
      onPlan: (_plan, rows) => {
        out(`[*] Generating ${rows} rows per scenario...`);
      },
      onScenario: (event) => {
        const line = `  - (${event.index + 1}/${event.total}) Scenario '${event.name}'`;
        out(event.status === 'generated' ? `${line}: ${event.rows} rows` : `${line}: skipped`);
      },
    });

    for (const skipped of run.result.skipped) {
      err(`    [!] WARNING: Could not generate data for '${skipped.name}': ${skipped.reason}`);
    }

    if (run.status === 'failed') {
      err('[!] No test data was generated for any scenario.');
      return 1;
    }

    const paths = resolveOutputPaths(output);
    await writeDelimitedFile(paths.fullReport, run.reports.fullReport);
    await writeDelimitedFile(paths.dataOnly, run.reports.dataOnly);

    out('');
    out(`[+] Full report with scenarios saved to '${paths.fullReport}'`);
    out(`[+] Clean data for automation saved to '${paths.dataOnly}'`);
    return 0;
  } catch (error) {
    if (error instanceof PlanError) {
      err(`[!] ERROR: Failed to generate or parse test plan: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    prompter.close();
  }
}
