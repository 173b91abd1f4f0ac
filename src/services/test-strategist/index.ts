/**
 * Test Strategist
 * Requirement-driven generation: plan, row count, scenario rows
 */

export * from './types.js';
export { PlanSynthesizer } from './plan-synthesizer.js';
export { FALLBACK_ROWS_PER_SCENARIO, RowCountAdvisor } from './row-count-advisor.js';
export type { RowCountAdvisorOptions } from './row-count-advisor.js';
export { ScenarioRowGenerator, toFieldValue } from './scenario-row-generator.js';
export type { ScenarioGenerationOptions, ScenarioProgressEvent } from './scenario-row-generator.js';
export { parseIntegerResponse, parseStructuredResponse, stripCodeFences } from './response-parser.js';
export type { StructuredResult } from './response-parser.js';
