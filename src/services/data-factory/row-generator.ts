/**
 * Row Generator
 * Produces one record per requested row by resolving every schema field
 * through the generator registry
 */

import type { Faker } from '@faker-js/faker';
import type {
  CaseKind,
  DataRecord,
  FieldCase,
  FieldDescriptor,
  FieldIssue,
  FieldValue,
  RowGenerationResult,
  Schema,
} from './types.js';
import { SchemaError, SchemaErrorType } from './types.js';
import type { GeneratorRegistry } from './value-generators.js';
import {
  AI_GENERATION_ERROR,
  DEFAULT_CONTEXT_PROMPT,
  failedGeneratorSentinel,
  missingGeneratorSentinel,
} from './sentinels.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';

export interface RowGenerationOptions {
  /**
   * Checked between rows; generation stops early once aborted
   */
  signal?: AbortSignal;

  /**
   * Called after every completed row
   */
  onRow?: (rowIndex: number, rowCount: number) => void;
}

interface ResolvedValue {
  value: FieldValue;
  issue?: FieldIssue['reason'];
}

export class RowGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly registry: GeneratorRegistry,
    private readonly faker: Faker
  ) {
    this.logger = createModuleLogger('services:row-generator');
  }

  /**
   * Generate `rowCount` records for the schema. Never fails because of a
   * missing or failing generator: sentinels are written in-line instead.
   */
  async generate(
    schema: Schema,
    rowCount: number,
    casePolicy: CaseKind,
    options: RowGenerationOptions = {}
  ): Promise<RowGenerationResult> {
    if (!Number.isInteger(rowCount) || rowCount <= 0) {
      throw new SchemaError(SchemaErrorType.INVALID_ROW_COUNT, `Row count must be a positive integer, got ${rowCount}`);
    }
    if (schema.size === 0) {
      throw new SchemaError(SchemaErrorType.EMPTY_SCHEMA, 'A schema needs at least one field');
    }

    const startTime = Date.now();
    const columns = [...schema.keys()];
    const records: DataRecord[] = [];
    const issues: FieldIssue[] = [];

    this.logger.info('Generating records', { rowCount, casePolicy, fields: columns.length });

    for (let row = 0; row < rowCount; row++) {
      if (options.signal?.aborted) {
        this.logger.warn('Generation aborted', { completedRows: row, rowCount });
        break;
      }

      const entries: Array<[string, FieldValue]> = [];

      for (const [field, descriptor] of schema) {
        const fieldCase = this.pickCase(casePolicy);
        const resolved = await this.resolveValue(descriptor, fieldCase);
        entries.push([field, resolved.value]);

        if (resolved.issue) {
          issues.push({ row, field, fieldCase, reason: resolved.issue, value: resolved.value });
        }
      }

      // fromEntries defines own keys, so a field named "__proto__" stays a column
      const record: DataRecord = Object.fromEntries(entries);
      records.push(record);
      options.onRow?.(row, rowCount);
    }

    const durationMs = Date.now() - startTime;

    this.logger.info('Records generated', {
      rows: records.length,
      issues: issues.length,
      durationMs,
    });

    return {
      dataset: { columns, records },
      issues,
      metadata: {
        rowCount: records.length,
        casePolicy,
        durationMs,
        aborted: records.length < rowCount,
      },
    };
  }

  private pickCase(casePolicy: CaseKind): FieldCase {
    if (casePolicy === 'mixed') {
      return this.faker.helpers.arrayElement<FieldCase>(['positive', 'negative']);
    }
    return casePolicy;
  }

  private async resolveValue(descriptor: FieldDescriptor, fieldCase: FieldCase): Promise<ResolvedValue> {
    const producer = this.registry.resolve(descriptor.type, fieldCase);

    if (!producer) {
      return { value: missingGeneratorSentinel(descriptor.type, fieldCase), issue: 'missing_generator' };
    }

    if (producer.kind === 'contextual') {
      try {
        return { value: await producer.produce(descriptor.context ?? DEFAULT_CONTEXT_PROMPT) };
      } catch (error) {
        this.logger.error('Text generation failed', {
          type: descriptor.type,
          error: error instanceof Error ? error.message : String(error),
        });
        return { value: AI_GENERATION_ERROR, issue: 'service_failure' };
      }
    }

    try {
      return { value: producer.produce() };
    } catch (error) {
      this.logger.error('Generator failed', {
        type: descriptor.type,
        fieldCase,
        error: error instanceof Error ? error.message : String(error),
      });
      return { value: failedGeneratorSentinel(descriptor.type, fieldCase), issue: 'generator_failure' };
    }
  }
}
