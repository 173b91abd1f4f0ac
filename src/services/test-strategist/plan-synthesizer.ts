/**
 * Plan Synthesizer
 * Turns a free-text requirement into a test plan via the text service
 */

import { z } from 'zod';
import type { TextCapability } from '../../llm/text-service.js';
import { requireTextService } from '../../llm/text-service.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { buildPlanPrompt, PLAN_SYSTEM_PROMPT } from './prompts.js';
import { parseStructuredResponse } from './response-parser.js';
import type { Scenario, TestPlan } from './types.js';
import { PlanError, PlanErrorType } from './types.js';

const MAX_REQUIREMENT_LENGTH = 5000;

const scenarioWireSchema = z.object({
  scenario_name: z.string().trim().min(1),
  test_type: z.string().trim().min(1),
  description: z.string().trim().default(''),
});

const planWireSchema = z.object({
  fields: z.array(z.coerce.string().trim().min(1)),
  scenarios: z.array(scenarioWireSchema),
});

export class PlanSynthesizer {
  private readonly logger: Logger;

  constructor(private readonly capability: TextCapability) {
    this.logger = createModuleLogger('services:plan-synthesizer');
  }

  /**
   * Ask the text service for a plan. Fails with PlanError; never retries.
   */
  async synthesize(requirement: string): Promise<TestPlan> {
    const trimmed = requirement.trim();

    if (!trimmed) {
      throw new PlanError(PlanErrorType.INVALID_INPUT, 'Requirement must be a non-empty string');
    }
    if (trimmed.length > MAX_REQUIREMENT_LENGTH) {
      throw new PlanError(
        PlanErrorType.INVALID_INPUT,
        `Requirement is too long (maximum ${MAX_REQUIREMENT_LENGTH} characters)`
      );
    }

    this.logger.info('Generating test plan', { requirementLength: trimmed.length });

    let response: string;
    try {
      const service = requireTextService(this.capability);
      response = await service.generate(buildPlanPrompt(trimmed), {
        systemPrompt: PLAN_SYSTEM_PROMPT,
        temperature: 0.3,
      });
    } catch (error) {
      this.logger.error('Plan request failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new PlanError(
        PlanErrorType.SERVICE_ERROR,
        error instanceof Error ? error.message : String(error),
        error
      );
    }

    const parsed = parseStructuredResponse(response, planWireSchema);
    if (!parsed.success) {
      this.logger.error('Plan response could not be parsed', { error: parsed.error });
      throw new PlanError(PlanErrorType.PARSE_ERROR, parsed.error);
    }

    const fields = [...new Set(parsed.data.fields)];
    const scenarios: Scenario[] = parsed.data.scenarios.map((scenario) => ({
      name: scenario.scenario_name,
      testType: scenario.test_type,
      description: scenario.description,
    }));

    if (scenarios.length === 0) {
      throw new PlanError(PlanErrorType.EMPTY_PLAN, 'The plan contains no scenarios');
    }
    if (fields.length === 0) {
      throw new PlanError(PlanErrorType.EMPTY_PLAN, 'The plan names no data fields');
    }

    this.logger.info('Test plan generated', {
      fields: fields.length,
      scenarios: scenarios.length,
    });

    return { fields, scenarios };
  }
}
