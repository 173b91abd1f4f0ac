/**
 * Data Factory
 * Schema-driven generation with fakers and the text service
 */

export * from './types.js';
export * from './sentinels.js';
export { createFaker } from './faker.js';
export {
  AI_TEXT_TYPE,
  GeneratorRegistry,
  contextualProducer,
  createDefaultRegistry,
  staticProducer,
} from './value-generators.js';
export type { DefaultRegistryOptions } from './value-generators.js';
export { defineSchema, loadSchemaFile, parseSchemaDefinition, schemaToDefinition } from './schema.js';
export type { FieldDefinition, SchemaDefinition } from './schema.js';
export { RowGenerator } from './row-generator.js';
export type { RowGenerationOptions } from './row-generator.js';
