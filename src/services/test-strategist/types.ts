/**
 * Test Strategist Types
 * Requirement-derived test plans and the rows generated for them
 */

import type { Dataset } from '../data-factory/types.js';

export const SCENARIO_NAME_COLUMN = 'scenario_name';
export const TEST_TYPE_COLUMN = 'test_type';

/**
 * Columns every scenario dataset carries ahead of the plan's fields
 */
export const PROVENANCE_COLUMNS = [SCENARIO_NAME_COLUMN, TEST_TYPE_COLUMN] as const;

/**
 * A named test situation from a plan
 */
export interface Scenario {
  readonly name: string;

  /**
   * Case classification as the plan states it, e.g. "positive", "negative", "edge"
   */
  readonly testType: string;
  readonly description: string;
}

export interface TestPlan {
  /**
   * Data fields every scenario row carries, in plan order, without duplicates
   */
  readonly fields: readonly string[];
  readonly scenarios: readonly Scenario[];
}

/**
 * A scenario that produced no rows
 */
export interface SkippedScenario {
  index: number;
  name: string;
  reason: string;
}

export interface ScenarioGenerationResult {
  dataset: Dataset;
  skipped: SkippedScenario[];
  metadata: {
    scenarioCount: number;
    generatedScenarios: number;
    rowsPerScenario: number;
    durationMs: number;
    aborted: boolean;
  };
}

export enum PlanErrorType {
  /**
   * Blank or oversized requirement
   */
  INVALID_INPUT = 'INVALID_INPUT',

  /**
   * The text service failed or is unavailable
   */
  SERVICE_ERROR = 'SERVICE_ERROR',

  /**
   * The response did not match the plan shape
   */
  PARSE_ERROR = 'PARSE_ERROR',

  /**
   * The plan has no scenarios or no fields
   */
  EMPTY_PLAN = 'EMPTY_PLAN',
}

export class PlanError extends Error {
  constructor(
    public type: PlanErrorType,
    message: string,
    public originalError?: unknown
  ) {
    super(`[PlanSynthesizer] ${type}: ${message}`);
    this.name = 'PlanError';
  }
}
