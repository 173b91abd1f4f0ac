/**
 * Row generator tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { RowGenerator } from '../../src/services/data-factory/row-generator.js';
import {
  AI_TEXT_TYPE,
  GeneratorRegistry,
  contextualProducer,
  createDefaultRegistry,
  staticProducer,
} from '../../src/services/data-factory/value-generators.js';
import { createFaker } from '../../src/services/data-factory/faker.js';
import { defineSchema } from '../../src/services/data-factory/schema.js';
import { AI_DISABLED, AI_GENERATION_ERROR, DEFAULT_CONTEXT_PROMPT } from '../../src/services/data-factory/sentinels.js';
import { SchemaError, SchemaErrorType } from '../../src/services/data-factory/types.js';
import { ServiceError, ServiceErrorType } from '../../src/llm/text-service.js';
import { datasetToTable } from '../../src/services/export/table.js';
import { ScriptedTextService, available, unavailable } from '../fixtures/text-service.fixture.js';

function markerRegistry(): GeneratorRegistry {
  return new GeneratorRegistry().register('marker', {
    positive: staticProducer(() => 'P'),
    negative: staticProducer(() => 'N'),
  });
}

describe('RowGenerator', () => {
  const faker = createFaker('en', 99);

  it('should produce one record per row with columns in schema order', async () => {
    const generator = new RowGenerator(createDefaultRegistry({ faker, capability: unavailable }), faker);
    const schema = defineSchema([
      { name: 'id', type: 'uuid' },
      { name: 'email', type: 'email' },
      { name: 'age', type: 'integer' },
    ]);

    const result = await generator.generate(schema, 5, 'positive');

    assert.deepStrictEqual(result.dataset.columns, ['id', 'email', 'age']);
    assert.strictEqual(result.dataset.records.length, 5);
    for (const record of result.dataset.records) {
      assert.deepStrictEqual(Object.keys(record), ['id', 'email', 'age']);
    }
    assert.deepStrictEqual(result.issues, []);
    assert.strictEqual(result.metadata.rowCount, 5);
    assert.strictEqual(result.metadata.aborted, false);
  });

  it('should keep a field named __proto__ as an ordinary column', async () => {
    const generator = new RowGenerator(markerRegistry(), faker);
    const schema = defineSchema([
      { name: '__proto__', type: 'marker' },
      { name: 'id', type: 'marker' },
    ]);

    const result = await generator.generate(schema, 1, 'positive');
    const [record] = result.dataset.records;

    assert.ok(record);
    assert.deepStrictEqual(Object.keys(record), ['__proto__', 'id']);
    assert.strictEqual(Object.getPrototypeOf(record), Object.prototype);
    assert.deepStrictEqual(datasetToTable(result.dataset).rows, [['P', 'P']]);
  });

  it('should use one case for every field under a fixed policy', async () => {
    const generator = new RowGenerator(markerRegistry(), faker);
    const schema = defineSchema([
      { name: 'a', type: 'marker' },
      { name: 'b', type: 'marker' },
    ]);

    const negative = await generator.generate(schema, 3, 'negative');
    assert.deepStrictEqual(negative.dataset.records, [
      { a: 'N', b: 'N' },
      { a: 'N', b: 'N' },
      { a: 'N', b: 'N' },
    ]);
  });

  it('should draw the case per field under the mixed policy', async () => {
    const generator = new RowGenerator(markerRegistry(), createFaker('en', 5));
    const schema = defineSchema([
      { name: 'a', type: 'marker' },
      { name: 'b', type: 'marker' },
      { name: 'c', type: 'marker' },
    ]);

    const result = await generator.generate(schema, 40, 'mixed');
    const values = result.dataset.records.flatMap((record) => Object.values(record));

    assert.strictEqual(values.length, 120);
    assert.ok(values.includes('P'));
    assert.ok(values.includes('N'));
    assert.ok(result.dataset.records.some((record) => new Set(Object.values(record)).size > 1));
  });

  it('should write a sentinel for an unknown type and keep going', async () => {
    const generator = new RowGenerator(markerRegistry(), faker);
    const schema = defineSchema([
      { name: 'known', type: 'marker' },
      { name: 'phone', type: 'phone' },
    ]);

    const result = await generator.generate(schema, 2, 'negative');

    assert.deepStrictEqual(result.dataset.records, [
      { known: 'N', phone: 'NO_GENERATOR_FOR_phone_negative' },
      { known: 'N', phone: 'NO_GENERATOR_FOR_phone_negative' },
    ]);
    assert.deepStrictEqual(result.issues[0], {
      row: 0,
      field: 'phone',
      fieldCase: 'negative',
      reason: 'missing_generator',
      value: 'NO_GENERATOR_FOR_phone_negative',
    });
  });

  it('should treat a missing case producer as a missing generator', async () => {
    const registry = new GeneratorRegistry().register('half', { positive: staticProducer(() => 'ok') });
    const generator = new RowGenerator(registry, faker);

    const result = await generator.generate(defineSchema([{ name: 'h', type: 'half' }]), 1, 'negative');
    assert.deepStrictEqual(result.dataset.records, [{ h: 'NO_GENERATOR_FOR_half_negative' }]);
  });

  it('should write a sentinel when a generator throws', async () => {
    const registry = new GeneratorRegistry().register('broken', {
      positive: staticProducer(() => {
        throw new Error('kaput');
      }),
    });
    const generator = new RowGenerator(registry, faker);

    const result = await generator.generate(defineSchema([{ name: 'x', type: 'broken' }]), 1, 'positive');

    assert.deepStrictEqual(result.dataset.records, [{ x: 'GENERATOR_FAILED_FOR_broken_positive' }]);
    assert.strictEqual(result.issues[0]?.reason, 'generator_failure');
  });

  it('should pass the field context, or the default prompt, to contextual producers', async () => {
    const service = new ScriptedTextService((prompt) => `text for ${prompt}`);
    const registry = createDefaultRegistry({ faker, capability: available(service) });
    const generator = new RowGenerator(registry, faker);
    const schema = defineSchema([
      { name: 'review', type: AI_TEXT_TYPE, context: 'a hotel review' },
      { name: 'note', type: AI_TEXT_TYPE },
    ]);

    const result = await generator.generate(schema, 1, 'positive');

    assert.deepStrictEqual(result.dataset.records, [
      { review: 'text for a hotel review', note: `text for ${DEFAULT_CONTEXT_PROMPT}` },
    ]);
    assert.deepStrictEqual(
      service.calls.map((call) => call.prompt),
      ['a hotel review', DEFAULT_CONTEXT_PROMPT]
    );
  });

  it('should mark a failed service call and continue', async () => {
    const service = new ScriptedTextService(new ServiceError(ServiceErrorType.TIMEOUT, 'slow'), 'recovered');
    const registry = createDefaultRegistry({ faker, capability: available(service) });
    const generator = new RowGenerator(registry, faker);

    const result = await generator.generate(
      defineSchema([{ name: 'text', type: AI_TEXT_TYPE, context: 'anything' }]),
      2,
      'positive'
    );

    assert.deepStrictEqual(result.dataset.records, [{ text: AI_GENERATION_ERROR }, { text: 'recovered' }]);
    assert.strictEqual(result.issues.length, 1);
    assert.strictEqual(result.issues[0]?.reason, 'service_failure');
  });

  it('should write AI_DISABLED without a text service', async () => {
    const generator = new RowGenerator(createDefaultRegistry({ faker, capability: unavailable }), faker);

    const result = await generator.generate(defineSchema([{ name: 't', type: AI_TEXT_TYPE }]), 1, 'positive');
    assert.deepStrictEqual(result.dataset.records, [{ t: AI_DISABLED }]);
  });

  it('should reject a row count below one', async () => {
    const generator = new RowGenerator(markerRegistry(), faker);
    const schema = defineSchema([{ name: 'a', type: 'marker' }]);

    await assert.rejects(
      generator.generate(schema, 0, 'positive'),
      (error: unknown) => error instanceof SchemaError && error.type === SchemaErrorType.INVALID_ROW_COUNT
    );
    await assert.rejects(generator.generate(schema, 1.5, 'positive'), SchemaError);
  });

  it('should stop between rows once aborted', async () => {
    const registry = new GeneratorRegistry().register('slow', {
      positive: contextualProducer(async () => 'v'),
    });
    const generator = new RowGenerator(registry, faker);
    const controller = new AbortController();
    const seen: number[] = [];

    const result = await generator.generate(defineSchema([{ name: 's', type: 'slow' }]), 10, 'positive', {
      signal: controller.signal,
      onRow: (row) => {
        seen.push(row);
        if (row === 2) {
          controller.abort();
        }
      },
    });

    assert.deepStrictEqual(seen, [0, 1, 2]);
    assert.strictEqual(result.dataset.records.length, 3);
    assert.strictEqual(result.metadata.aborted, true);
  });
});
