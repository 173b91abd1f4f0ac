/**
 * CLI command tests
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runCli } from '../../src/cli/program.js';
import { parseGenerateArgs } from '../../src/cli/commands/generate.js';
import { parseRowsChoice } from '../../src/cli/commands/strategize.js';
import type { CommandContext } from '../../src/cli/commands/context.js';
import type { Prompter } from '../../src/cli/prompter.js';
import { createDataForge, VERSION } from '../../src/core/index.js';
import { parseEnv } from '../../src/config/env.js';
import type { TextCapability } from '../../src/llm/text-service.js';
import { ScriptedTextService, available, unavailable } from '../fixtures/text-service.fixture.js';

class QueuePrompter implements Prompter {
  readonly questions: string[] = [];
  closed = false;

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No answer left for: ${question}`);
    }
    return answer;
  }

  close(): void {
    this.closed = true;
  }
}

interface Harness {
  context: CommandContext;
  prompter: QueuePrompter;
  out: string[];
  err: string[];
}

function harness(capability: TextCapability, answers: string[] = []): Harness {
  const out: string[] = [];
  const err: string[] = [];
  const prompter = new QueuePrompter(answers);
  return {
    context: {
      forge: createDataForge({ env: parseEnv({ DATA_SEED: '3', DATA_LOCALE: 'en' }), capability }),
      prompter,
      out: (line) => out.push(line),
      err: (line) => err.push(line),
    },
    prompter,
    out,
    err,
  };
}

const PLAN_REPLY = JSON.stringify({
  fields: ['username'],
  scenarios: [
    { scenario_name: 'Valid username', test_type: 'positive', description: 'Letters only' },
    { scenario_name: 'Too long', test_type: 'negative', description: 'Over 30 characters' },
  ],
});

function strategistService(): ScriptedTextService {
  return new ScriptedTextService((prompt) => {
    if (prompt.startsWith('Analyze the following user requirement')) {
      return PLAN_REPLY;
    }
    const count = Number.parseInt(prompt.slice('Generate '.length), 10);
    return JSON.stringify(Array.from({ length: count }, (_, i) => ({ username: `user${i}` })));
  });
}

describe('argument parsing', () => {
  it('should collect generate options and errors', () => {
    assert.deepStrictEqual(parseGenerateArgs(['-s', 'schema.json', '--rows', '5', '-c', 'MIXED', '-o', 'out']), {
      schemaPath: 'schema.json',
      rows: 5,
      casePolicy: 'mixed',
      output: 'out',
      help: false,
      errors: [],
    });
    assert.deepStrictEqual(parseGenerateArgs(['--rows', '0', '--bogus']).errors, [
      '--rows needs a positive integer',
      "Unknown option '--bogus'",
    ]);
  });

  it('should read rows per scenario as a number or ideal', () => {
    assert.strictEqual(parseRowsChoice('4'), 4);
    assert.strictEqual(parseRowsChoice(' Ideal '), 'ideal');
    assert.strictEqual(parseRowsChoice('auto'), 'ideal');
    assert.strictEqual(parseRowsChoice('lots'), undefined);
    assert.strictEqual(parseRowsChoice('0'), undefined);
  });
});

describe('runCli', () => {
  let dir = '';

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cli-test-'));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should print help without building the engine', async () => {
    const out: string[] = [];
    const code = await runCli([], {
      out: (line) => out.push(line),
      createContext: () => {
        throw new Error('engine should not be built');
      },
    });

    assert.strictEqual(code, 0);
    assert.ok(out[0]?.includes('Usage:\n  test-data-forge <command> [options]'));
  });

  it('should print the version', async () => {
    const out: string[] = [];
    assert.strictEqual(await runCli(['--version'], { out: (line) => out.push(line) }), 0);
    assert.deepStrictEqual(out, [VERSION]);
  });

  it('should reject an unknown command', async () => {
    const out: string[] = [];
    assert.strictEqual(await runCli(['explode'], { out: (line) => out.push(line) }), 1);
    assert.strictEqual(out[0], "Unknown command 'explode'");
  });

  it('should generate from a schema file without prompting', async () => {
    const schemaPath = join(dir, 'schema.json');
    await writeFile(
      schemaPath,
      JSON.stringify({ fields: [{ name: 'email', type: 'email' }, { name: 'password', type: 'password' }] }),
      'utf8'
    );
    const h = harness(unavailable);

    const code = await runCli(['generate', '-s', schemaPath, '-r', '2', '-c', 'negative', '-o', join(dir, 'neg')], {
      createContext: () => h.context,
    });

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(h.prompter.questions, []);
    assert.strictEqual(h.prompter.closed, true);
    assert.strictEqual(
      await readFile(join(dir, 'neg.csv'), 'utf8'),
      'email,password\nnot-an-email,123\nnot-an-email,123\n'
    );
    assert.strictEqual(h.out[h.out.length - 1], `[+] Success! Data saved to '${join(dir, 'neg.csv')}'`);
  });

  it('should build a schema interactively', async () => {
    const output = join(dir, 'interactive');
    const h = harness(unavailable, ['2', 'mail', 'x', '2', 'notes', '7', '1', '2', output]);

    const code = await runCli(['generate'], { createContext: () => h.context });

    assert.strictEqual(code, 0);
    assert.ok(h.out.includes('[!] Invalid input, please try again.'));
    assert.ok(
      h.out.includes("Cannot use 'ai_text' because no text service is configured. Skipping the context prompt.")
    );
    assert.strictEqual(await readFile(`${output}.csv`, 'utf8'), 'mail,notes\nnot-an-email,INVALID_AI_PROMPT\n');
  });

  it('should keep ai_text fields without a text service and fill them with AI_DISABLED', async () => {
    const output = join(dir, 'ai-only');
    const h = harness(unavailable, ['1', 'bio', '7', '2', '1', output]);

    const code = await runCli(['generate'], { createContext: () => h.context });

    assert.strictEqual(code, 0);
    assert.ok(!h.prompter.questions.includes('  > Enter the AI context prompt for this field: '));
    assert.strictEqual(await readFile(`${output}.csv`, 'utf8'), 'bio\nAI_DISABLED\nAI_DISABLED\n');
  });

  it('should report an invalid case option', async () => {
    const h = harness(unavailable);

    assert.strictEqual(await runCli(['generate', '-c', 'sideways'], { createContext: () => h.context }), 1);
    assert.deepStrictEqual(h.err, ['Error: -c must be one of: positive, negative, mixed']);
  });

  it('should report a schema that cannot be loaded', async () => {
    const h = harness(unavailable);

    const code = await runCli(['generate', '-s', join(dir, 'nope.json')], { createContext: () => h.context });

    assert.strictEqual(code, 1);
    assert.ok(h.err[0]?.startsWith('[!] ERROR: [Schema] FILE_ERROR: '));
  });

  it('should write the full and data-only reports', async () => {
    const base = join(dir, 'login');
    const h = harness(available(strategistService()));

    const code = await runCli(['strategize', '-q', 'a username field', '-r', '2', '-o', base], {
      createContext: () => h.context,
    });

    assert.strictEqual(code, 0);
    assert.strictEqual(
      await readFile(`${base}_full_report.csv`, 'utf8'),
      'scenario_name,test_type,username\n' +
        'Valid username,positive,user0\n' +
        'Valid username,positive,user1\n' +
        'Too long,negative,user0\n' +
        'Too long,negative,user1\n'
    );
    assert.strictEqual(await readFile(`${base}_data_only.csv`, 'utf8'), 'username\nuser0\nuser1\nuser0\nuser1\n');
  });

  it('should fall back to the default count for an invalid rows answer', async () => {
    const base = join(dir, 'fallback');
    const h = harness(available(strategistService()), ['a username field', 'lots', base]);

    const code = await runCli(['strategize'], { createContext: () => h.context });

    assert.strictEqual(code, 0);
    assert.ok(h.out.includes('[!] Invalid number, defaulting to 3.'));
    const lines = (await readFile(`${base}_data_only.csv`, 'utf8')).trimEnd().split('\n');
    assert.strictEqual(lines.length, 7);
  });

  it('should exit with an error when no plan can be made', async () => {
    const h = harness(unavailable);

    const code = await runCli(['strategize', '-q', 'login', '-r', '1', '-o', join(dir, 'none')], {
      createContext: () => h.context,
    });

    assert.strictEqual(code, 1);
    assert.strictEqual(
      h.err[0],
      '[!] ERROR: Failed to generate or parse test plan: [PlanSynthesizer] SERVICE_ERROR: [TextService] UNAVAILABLE: no key configured'
    );
  });

  it('should ask for rows and the output name only after the plan is shown', async () => {
    const base = join(dir, 'ordered');
    const h = harness(available(strategistService()), ['a username field', '1', base]);

    const code = await runCli(['strategize'], { createContext: () => h.context });

    assert.strictEqual(code, 0);
    assert.strictEqual(h.prompter.questions.length, 3);
    const planLine = h.out.indexOf('[+] Test plan generated with 2 scenarios.');
    assert.ok(planLine > h.out.indexOf('[*] Generating test plan from your requirement...'));
    assert.ok(planLine < h.out.indexOf('[*] Generating 1 rows per scenario...'));
  });

  it('should not ask for rows or an output name when the plan fails', async () => {
    const h = harness(unavailable, ['login']);

    const code = await runCli(['strategize'], { createContext: () => h.context });

    assert.strictEqual(code, 1);
    assert.deepStrictEqual(h.prompter.questions, [
      "Enter your user requirement (e.g., 'a login form with email and password'):\n> ",
    ]);
  });
});
