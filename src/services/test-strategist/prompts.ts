/**
 * Prompt builders for the requirement-driven pipeline
 */

import type { Scenario, TestPlan } from './types.js';

export const PLAN_SYSTEM_PROMPT =
  'You are an expert QA test analyst. You turn product requirements into structured test plans and answer with JSON only.';

export const ROW_COUNT_SYSTEM_PROMPT =
  'You are a QA lead sizing test data sets. You answer with a single integer only.';

export const SCENARIO_DATA_SYSTEM_PROMPT =
  'You generate synthetic test data. You answer with a JSON array only, without explanations or Markdown.';

export function buildPlanPrompt(requirement: string): string {
  return `Analyze the following user requirement and produce a structured test plan.

User requirement: ${JSON.stringify(requirement)}

Respond with a single JSON object with exactly two top-level keys and nothing else:
- "fields": an array of strings naming the data fields a test row needs
- "scenarios": an array of objects with the keys "scenario_name", "test_type" and "description"

"test_type" is one of "positive", "negative" or "edge".`;
}

/**
 * Plan as sent back to the model, in the same shape the plan prompt asked for
 */
function planToWireFormat(plan: TestPlan): Record<string, unknown> {
  return {
    fields: plan.fields,
    scenarios: plan.scenarios.map((scenario) => ({
      scenario_name: scenario.name,
      test_type: scenario.testType,
      description: scenario.description,
    })),
  };
}

export function buildRowCountPrompt(plan: TestPlan): string {
  return `Analyze the following test plan. Based on the number and variety of its scenarios, decide how many rows of test data to generate PER SCENARIO for good coverage without being excessive.

Test plan:
${JSON.stringify(planToWireFormat(plan), null, 2)}

Your response MUST be a single integer and nothing else. For example: 3`;
}

export function buildScenarioRowsPrompt(
  scenario: Scenario,
  fields: readonly string[],
  rowsPerScenario: number
): string {
  return `Generate ${rowsPerScenario} unique JSON objects of test data that precisely match the following test scenario.

Scenario: ${JSON.stringify(scenario.name)} (${scenario.testType})
Scenario description: ${JSON.stringify(scenario.description)}

Each JSON object MUST contain exactly these keys: ${JSON.stringify(fields)}.
The values for each key must suit the scenario; use strings or numbers only.
Your response MUST be a single valid JSON array containing the ${rowsPerScenario} objects, and nothing else.`;
}
