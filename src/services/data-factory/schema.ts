/**
 * Schema Model
 * Builds the ordered field map used by the row generator, from code,
 * from a JSON definition file or interactively
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { FieldDescriptor, Schema, TypeName } from './types.js';
import { SchemaError, SchemaErrorType } from './types.js';

export interface FieldDefinition {
  name: string;
  type: TypeName;
  context?: string;
}

const descriptorSchema = z
  .object({
    type: z.string().min(1),
    context: z.string().optional(),
    // Older schema files store the ai_text context under "prompt"
    prompt: z.string().optional(),
  })
  .strict();

const fieldEntrySchema = z
  .object({
    name: z.string().min(1),
    type: z.string().min(1),
    context: z.string().optional(),
  })
  .strict();

const schemaDefinitionSchema = z.object({
  fields: z.union([z.array(fieldEntrySchema), z.record(descriptorSchema)]),
});

export type SchemaDefinition = z.infer<typeof schemaDefinitionSchema>;

/**
 * Build a schema from an ordered field list
 */
export function defineSchema(fields: readonly FieldDefinition[]): Schema {
  if (fields.length === 0) {
    throw new SchemaError(SchemaErrorType.EMPTY_SCHEMA, 'A schema needs at least one field');
  }

  const schema = new Map<string, FieldDescriptor>();

  for (const field of fields) {
    const name = field.name.trim();
    if (!name) {
      throw new SchemaError(SchemaErrorType.INVALID_DEFINITION, 'Field names must not be empty');
    }
    if (schema.has(name)) {
      throw new SchemaError(SchemaErrorType.DUPLICATE_FIELD, `Field '${name}' is defined more than once`);
    }

    const descriptor: FieldDescriptor = field.context !== undefined
      ? { type: field.type, context: field.context }
      : { type: field.type };
    schema.set(name, Object.freeze(descriptor));
  }

  return schema;
}

/**
 * Validate an already-decoded JSON value as a schema definition
 */
export function parseSchemaDefinition(input: unknown): Schema {
  const result = schemaDefinitionSchema.safeParse(input);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new SchemaError(SchemaErrorType.INVALID_DEFINITION, details, result.error);
  }

  const { fields } = result.data;

  if (Array.isArray(fields)) {
    return defineSchema(fields);
  }

  return defineSchema(
    Object.entries(fields).map(([name, descriptor]) => ({
      name,
      type: descriptor.type,
      context: descriptor.context ?? descriptor.prompt,
    }))
  );
}

/**
 * Read and validate a JSON schema file
 */
export async function loadSchemaFile(path: string): Promise<Schema> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new SchemaError(SchemaErrorType.FILE_ERROR, `Cannot read schema file '${path}'`, error);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new SchemaError(SchemaErrorType.INVALID_DEFINITION, `Schema file '${path}' is not valid JSON`, error);
  }

  return parseSchemaDefinition(decoded);
}

/**
 * Plain-object form of a schema, in the array layout accepted by parseSchemaDefinition
 */
export function schemaToDefinition(schema: Schema): { fields: FieldDefinition[] } {
  return {
    fields: [...schema.entries()].map(([name, descriptor]) =>
      descriptor.context !== undefined
        ? { name, type: descriptor.type, context: descriptor.context }
        : { name, type: descriptor.type }
    ),
  };
}
