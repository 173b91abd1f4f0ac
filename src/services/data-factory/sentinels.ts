/**
 * Placeholder values written in place of data that could not be generated
 */

import type { FieldCase, TypeName } from './types.js';

/**
 * ai_text positive case when no text service is configured
 */
export const AI_DISABLED = 'AI_DISABLED';

/**
 * ai_text positive case when the text service call failed
 */
export const AI_GENERATION_ERROR = 'AI_GENERATION_ERROR';

/**
 * ai_text negative case
 */
export const INVALID_AI_PROMPT = 'INVALID_AI_PROMPT';

/**
 * A column a row did not provide
 */
export const NO_VALUE_GENERATED = 'NO_VALUE_GENERATED';

export const DEFAULT_CONTEXT_PROMPT = 'generate random text';

export function missingGeneratorSentinel(typeName: TypeName, fieldCase: FieldCase): string {
  return `NO_GENERATOR_FOR_${typeName}_${fieldCase}`;
}

/**
 * A static generator threw while producing a value
 */
export function failedGeneratorSentinel(typeName: TypeName, fieldCase: FieldCase): string {
  return `GENERATOR_FAILED_FOR_${typeName}_${fieldCase}`;
}
