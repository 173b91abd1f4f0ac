/**
 * Interactive schema builder
 */

import { defineSchema } from '../services/data-factory/schema.js';
import type { FieldDefinition } from '../services/data-factory/schema.js';
import type { Schema } from '../services/data-factory/types.js';
import { AI_TEXT_TYPE } from '../services/data-factory/value-generators.js';
import type { GeneratorRegistry } from '../services/data-factory/value-generators.js';
import type { TextCapability } from '../llm/text-service.js';
import { askUntilValid, parseNonEmpty, parsePositiveInt } from './prompter.js';
import type { Output, Prompter } from './prompter.js';

export async function buildSchemaInteractively(
  prompter: Prompter,
  registry: GeneratorRegistry,
  capability: TextCapability,
  out: Output
): Promise<Schema> {
  out('--- Interactive Schema Builder ---');

  const fieldCount = await askUntilValid(
    prompter,
    'How many fields do you want to define? ',
    parsePositiveInt,
    out
  );

  const types = registry.list();
  out('');
  out('Available data types:');
  types.forEach((type, i) => out(`  ${i + 1}. ${type}`));

  const fields: FieldDefinition[] = [];

  for (let i = 0; i < fieldCount; i++) {
    out('');
    out(`--- Defining Field #${i + 1} ---`);

    const name = await askUntilValid(
      prompter,
      'Enter the name for this field: ',
      (answer) => (answer && !fields.some((f) => f.name === answer) ? answer : undefined),
      out,
      '[!] Field names must be non-empty and unique, please try again.'
    );

    const type = await askUntilValid(
      prompter,
      `Choose a data type for '${name}' (enter number 1-${types.length}): `,
      (answer) => {
        const index = parsePositiveInt(answer);
        return index !== undefined ? types[index - 1] : undefined;
      },
      out
    );

    if (type === AI_TEXT_TYPE) {
      if (capability.status === 'unavailable') {
        // Kept without a context; the row generator writes AI_DISABLED for it
        fields.push({ name, type });
        out(`Cannot use '${AI_TEXT_TYPE}' because no text service is configured. Skipping the context prompt.`);
        continue;
      }
      const context = await askUntilValid(
        prompter,
        '  > Enter the AI context prompt for this field: ',
        parseNonEmpty,
        out
      );
      fields.push({ name, type, context });
    } else {
      fields.push({ name, type });
    }

    out(`[+] Field '${name}' set to type '${type}'.`);
  }

  return defineSchema(fields);
}
