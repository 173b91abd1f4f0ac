/**
 * Scenario Row Generator
 *
 * Requests a batch of rows per plan scenario and tags each row with the
 * scenario it belongs to. A failing scenario is skipped, never fatal.
 */

import { z } from 'zod';
import type { TextCapability } from '../../llm/text-service.js';
import { requireTextService } from '../../llm/text-service.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import type { DataRecord, FieldValue } from '../data-factory/types.js';
import { NO_VALUE_GENERATED } from '../data-factory/sentinels.js';
import { buildScenarioRowsPrompt, SCENARIO_DATA_SYSTEM_PROMPT } from './prompts.js';
import { parseStructuredResponse } from './response-parser.js';
import type {
  Scenario,
  ScenarioGenerationResult,
  SkippedScenario,
  TestPlan,
} from './types.js';
import { PROVENANCE_COLUMNS, SCENARIO_NAME_COLUMN, TEST_TYPE_COLUMN } from './types.js';

const rowsWireSchema = z.array(z.unknown());

export interface ScenarioProgressEvent {
  index: number;
  total: number;
  name: string;
  status: 'generated' | 'skipped';
  rows: number;
}

export interface ScenarioGenerationOptions {
  /**
   * Checked before each scenario starts
   */
  signal?: AbortSignal;

  /**
   * Scenarios requested at the same time; output order is unaffected
   */
  concurrency?: number;

  onScenario?: (event: ScenarioProgressEvent) => void;
}

type ScenarioOutcome =
  | { status: 'generated'; records: DataRecord[] }
  | { status: 'skipped'; reason: string };

/**
 * Convert one value from model output into a cell value
 */
export function toFieldValue(value: unknown): FieldValue {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : String(value);
  }
  if (typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value === null || value === undefined) {
    return '';
  }
  return JSON.stringify(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ScenarioRowGenerator {
  private readonly logger: Logger;
  private readonly defaultConcurrency: number;

  constructor(
    private readonly capability: TextCapability,
    options: { concurrency?: number } = {}
  ) {
    this.logger = createModuleLogger('services:scenario-row-generator');
    this.defaultConcurrency = options.concurrency ?? 1;
  }

  /**
   * Generate rows for every scenario of the plan, in plan order
   */
  async generateForPlan(
    plan: TestPlan,
    rowsPerScenario: number,
    options: ScenarioGenerationOptions = {}
  ): Promise<ScenarioGenerationResult> {
    if (!Number.isInteger(rowsPerScenario) || rowsPerScenario < 1) {
      throw new RangeError(`Rows per scenario must be a positive integer, got ${rowsPerScenario}`);
    }

    const startTime = Date.now();
    const dataFields = this.dataFields(plan);
    const total = plan.scenarios.length;
    const concurrency = Math.max(1, Math.min(options.concurrency ?? this.defaultConcurrency, total));
    const outcomes: Array<ScenarioOutcome | undefined> = new Array<ScenarioOutcome | undefined>(total).fill(undefined);

    this.logger.info('Generating test data for each scenario', {
      scenarios: total,
      rowsPerScenario,
      concurrency,
    });

    let nextIndex = 0;
    let aborted = false;

    const worker = async (): Promise<void> => {
      while (nextIndex < total) {
        if (options.signal?.aborted) {
          aborted = true;
          return;
        }

        const index = nextIndex++;
        const scenario = plan.scenarios[index];
        if (!scenario) {
          return;
        }

        const outcome = await this.runScenario(scenario, dataFields, rowsPerScenario);
        outcomes[index] = outcome;

        options.onScenario?.({
          index,
          total,
          name: scenario.name,
          status: outcome.status,
          rows: outcome.status === 'generated' ? outcome.records.length : 0,
        });
      }
    };

    await Promise.all(Array.from({ length: concurrency }, () => worker()));

    const records: DataRecord[] = [];
    const skipped: SkippedScenario[] = [];
    let generatedScenarios = 0;

    plan.scenarios.forEach((scenario, index) => {
      const outcome = outcomes[index];
      if (!outcome) {
        skipped.push({ index, name: scenario.name, reason: 'aborted before start' });
      } else if (outcome.status === 'skipped') {
        skipped.push({ index, name: scenario.name, reason: outcome.reason });
      } else {
        generatedScenarios++;
        records.push(...outcome.records);
      }
    });

    const durationMs = Date.now() - startTime;

    this.logger.info('Test data generation complete', {
      rows: records.length,
      generatedScenarios,
      skippedScenarios: skipped.length,
      durationMs,
    });

    return {
      dataset: {
        columns: [...PROVENANCE_COLUMNS, ...dataFields],
        records,
      },
      skipped,
      metadata: {
        scenarioCount: total,
        generatedScenarios,
        rowsPerScenario,
        durationMs,
        aborted,
      },
    };
  }

  private async runScenario(
    scenario: Scenario,
    fields: readonly string[],
    rowsPerScenario: number
  ): Promise<ScenarioOutcome> {
    let response: string;
    try {
      const service = requireTextService(this.capability);
      response = await service.generate(buildScenarioRowsPrompt(scenario, fields, rowsPerScenario), {
        systemPrompt: SCENARIO_DATA_SYSTEM_PROMPT,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn('Could not generate data for scenario', { scenario: scenario.name, error: reason });
      return { status: 'skipped', reason };
    }

    const parsed = parseStructuredResponse(response, rowsWireSchema);
    if (!parsed.success) {
      this.logger.warn('Could not parse data for scenario', { scenario: scenario.name, error: parsed.error });
      return { status: 'skipped', reason: parsed.error };
    }

    const rows = parsed.data.filter(isPlainObject);
    if (rows.length !== parsed.data.length) {
      this.logger.warn('Dropped non-object rows', {
        scenario: scenario.name,
        dropped: parsed.data.length - rows.length,
      });
    }
    if (rows.length !== rowsPerScenario) {
      this.logger.debug('Row count differs from request', {
        scenario: scenario.name,
        requested: rowsPerScenario,
        returned: rows.length,
      });
    }

    return {
      status: 'generated',
      records: rows.map((row) => this.tagRow(row, fields, scenario)),
    };
  }

  /**
   * Keep exactly the plan fields, padding absent ones, and prepend provenance
   */
  private tagRow(row: Record<string, unknown>, fields: readonly string[], scenario: Scenario): DataRecord {
    const entries: Array<[string, FieldValue]> = [
      [SCENARIO_NAME_COLUMN, scenario.name],
      [TEST_TYPE_COLUMN, scenario.testType],
    ];

    for (const field of fields) {
      entries.push([
        field,
        Object.prototype.hasOwnProperty.call(row, field) ? toFieldValue(row[field]) : NO_VALUE_GENERATED,
      ]);
    }

    return Object.fromEntries(entries);
  }

  /**
   * Plan fields minus any that would collide with the provenance columns
   */
  private dataFields(plan: TestPlan): string[] {
    const reserved: readonly string[] = PROVENANCE_COLUMNS;
    const fields = plan.fields.filter((field) => !reserved.includes(field));
    if (fields.length !== plan.fields.length) {
      this.logger.warn('Plan fields collide with provenance columns and were dropped', {
        dropped: plan.fields.filter((field) => reserved.includes(field)),
      });
    }
    return fields;
  }
}
