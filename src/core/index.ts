/**
 * Test Data Forge engine
 *
 * Wires configuration, the text capability and the generators together and
 * runs the schema-driven and requirement-driven pipelines.
 */

import type { Faker } from '@faker-js/faker';
import { config as defaultEnv } from '../config/env.js';
import type { Env } from '../config/env.js';
import { createTextCapability } from '../llm/text-service.js';
import type { TextCapability } from '../llm/text-service.js';
import { createFaker } from '../services/data-factory/faker.js';
import { createDefaultRegistry } from '../services/data-factory/value-generators.js';
import type { GeneratorRegistry } from '../services/data-factory/value-generators.js';
import { RowGenerator } from '../services/data-factory/row-generator.js';
import type {
  CaseKind,
  RowGenerationResult,
  Schema,
} from '../services/data-factory/types.js';
import { PlanSynthesizer } from '../services/test-strategist/plan-synthesizer.js';
import { RowCountAdvisor } from '../services/test-strategist/row-count-advisor.js';
import { ScenarioRowGenerator } from '../services/test-strategist/scenario-row-generator.js';
import type { ScenarioProgressEvent } from '../services/test-strategist/scenario-row-generator.js';
import type { ScenarioGenerationResult, TestPlan } from '../services/test-strategist/types.js';
import { buildScenarioReports } from '../services/export/table.js';
import type { ScenarioReports } from '../services/export/table.js';
import { createModuleLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export const VERSION = '0.1.0';

export type PipelineState = 'idle' | 'building-spec' | 'generating' | 'done' | 'failed';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  idle: ['building-spec'],
  'building-spec': ['generating', 'failed'],
  generating: ['done', 'failed'],
  done: ['idle'],
  failed: ['idle'],
};

export interface DataForgeOptions {
  env?: Env;

  /**
   * Replaces the capability built from `env`
   */
  capability?: TextCapability;
  faker?: Faker;
  registry?: GeneratorRegistry;
  onStateChange?: (state: PipelineState, previous: PipelineState) => void;
}

export interface SchemaPipelineRequest {
  schema: Schema;
  rowCount: number;
  casePolicy: CaseKind;
  signal?: AbortSignal;
  onRow?: (rowIndex: number, rowCount: number) => void;
}

export interface SchemaPipelineResult {
  status: 'done' | 'failed';
  result: RowGenerationResult;
}

export type RowsPerScenarioChoice = number | 'ideal';

export interface RequirementPipelineRequest {
  requirement: string;

  /**
   * A fixed count, 'ideal' to ask the row-count advisor, or a callback
   * that decides once the plan is known
   */
  rowsPerScenario: RowsPerScenarioChoice | ((plan: TestPlan) => Promise<RowsPerScenarioChoice>);
  signal?: AbortSignal;
  onPlan?: (plan: TestPlan, rowsPerScenario: number) => void;
  onScenario?: (event: ScenarioProgressEvent) => void;
}

export interface RequirementPipelineResult {
  status: 'done' | 'failed';
  plan: TestPlan;
  rowsPerScenario: number;
  result: ScenarioGenerationResult;
  reports: ScenarioReports;
}

export class DataForge {
  readonly env: Env;
  readonly capability: TextCapability;
  readonly registry: GeneratorRegistry;
  readonly rowGenerator: RowGenerator;
  readonly planSynthesizer: PlanSynthesizer;
  readonly rowCountAdvisor: RowCountAdvisor;
  readonly scenarioRowGenerator: ScenarioRowGenerator;

  private readonly logger: Logger;
  private readonly onStateChange?: DataForgeOptions['onStateChange'];
  private state: PipelineState = 'idle';

  constructor(options: DataForgeOptions = {}) {
    this.logger = createModuleLogger('core:engine');
    this.env = options.env ?? defaultEnv;
    this.onStateChange = options.onStateChange;
    this.capability = options.capability ?? createTextCapability(this.env);

    const faker = options.faker ?? createFaker(this.env.DATA_LOCALE, this.env.DATA_SEED);
    this.registry = options.registry ?? createDefaultRegistry({ faker, capability: this.capability });
    this.rowGenerator = new RowGenerator(this.registry, faker);
    this.planSynthesizer = new PlanSynthesizer(this.capability);
    this.rowCountAdvisor = new RowCountAdvisor(this.capability, {
      fallback: this.env.DEFAULT_ROWS_PER_SCENARIO,
      maxRowsPerScenario: this.env.MAX_ROWS_PER_SCENARIO,
    });
    this.scenarioRowGenerator = new ScenarioRowGenerator(this.capability, {
      concurrency: this.env.SCENARIO_CONCURRENCY,
    });
  }

  getState(): PipelineState {
    return this.state;
  }

  getVersion(): string {
    return VERSION;
  }

  /**
   * Schema-driven pipeline: one sequential pass over the requested rows
   */
  async runSchemaPipeline(request: SchemaPipelineRequest): Promise<SchemaPipelineResult> {
    this.begin();

    try {
      this.transition('generating');
      const result = await this.rowGenerator.generate(request.schema, request.rowCount, request.casePolicy, {
        signal: request.signal,
        onRow: request.onRow,
      });

      return { status: this.finish(result.dataset.records.length), result };
    } catch (error) {
      this.fail(error);
      throw error;
    }
  }

  /**
   * Requirement-driven pipeline. A PlanError aborts before any generation;
   * failing scenarios are skipped.
   */
  async runRequirementPipeline(request: RequirementPipelineRequest): Promise<RequirementPipelineResult> {
    this.begin();

    try {
      const plan = await this.planSynthesizer.synthesize(request.requirement);
      const choice = typeof request.rowsPerScenario === 'function'
        ? await request.rowsPerScenario(plan)
        : request.rowsPerScenario;
      const rowsPerScenario = choice === 'ideal' ? await this.rowCountAdvisor.advise(plan) : choice;

      request.onPlan?.(plan, rowsPerScenario);

      this.transition('generating');
      const result = await this.scenarioRowGenerator.generateForPlan(plan, rowsPerScenario, {
        signal: request.signal,
        onScenario: request.onScenario,
      });

      return {
        status: this.finish(result.dataset.records.length),
        plan,
        rowsPerScenario,
        result,
        reports: buildScenarioReports(result.dataset),
      };
    } catch (error) {
      this.fail(error);
      throw error;
    }
  }

  private begin(): void {
    if (this.state === 'building-spec' || this.state === 'generating') {
      throw new Error(`A pipeline is already running (state: ${this.state})`);
    }
    if (this.state !== 'idle') {
      this.transition('idle');
    }
    this.transition('building-spec');
  }

  /**
   * Only a run without a single row counts as failed
   */
  private finish(rows: number): 'done' | 'failed' {
    const status = rows > 0 ? 'done' : 'failed';
    if (status === 'failed') {
      this.logger.warn('Pipeline produced no data');
    }
    this.transition(status);
    return status;
  }

  private fail(error: unknown): void {
    this.logger.error('Pipeline failed', {
      state: this.state,
      error: error instanceof Error ? error.message : String(error),
    });
    if (this.state === 'building-spec' || this.state === 'generating') {
      this.transition('failed');
    }
  }

  private transition(next: PipelineState): void {
    const previous = this.state;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new Error(`Invalid pipeline transition: ${previous} -> ${next}`);
    }
    this.state = next;
    this.logger.debug('Pipeline state changed', { from: previous, to: next });
    this.onStateChange?.(next, previous);
  }
}

export function createDataForge(options: DataForgeOptions = {}): DataForge {
  return new DataForge(options);
}
