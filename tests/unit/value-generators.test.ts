/**
 * Value generator registry tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  AI_TEXT_TYPE,
  GeneratorRegistry,
  contextualProducer,
  createDefaultRegistry,
  staticProducer,
} from '../../src/services/data-factory/value-generators.js';
import { createFaker } from '../../src/services/data-factory/faker.js';
import { AI_DISABLED, INVALID_AI_PROMPT } from '../../src/services/data-factory/sentinels.js';
import type { FieldCase, FieldValue } from '../../src/services/data-factory/types.js';
import { ScriptedTextService, available, unavailable } from '../fixtures/text-service.fixture.js';

function produceStatic(registry: GeneratorRegistry, type: string, fieldCase: FieldCase): FieldValue {
  const producer = registry.resolve(type, fieldCase);
  assert.ok(producer, `no producer for ${type}/${fieldCase}`);
  if (producer.kind !== 'static') {
    throw new Error(`${type}/${fieldCase} is not a static producer`);
  }
  return producer.produce();
}

describe('GeneratorRegistry', () => {
  it('should resolve registered producers and miss unknown ones', () => {
    const registry = new GeneratorRegistry().register('flag', {
      positive: staticProducer(() => 'yes'),
    });

    assert.strictEqual(registry.has('flag'), true);
    assert.strictEqual(registry.resolve('flag', 'negative'), undefined);
    assert.strictEqual(registry.resolve('nothing', 'positive'), undefined);
    assert.strictEqual(produceStatic(registry, 'flag', 'positive'), 'yes');
  });

  it('should list types in registration order and replace on re-register', () => {
    const registry = new GeneratorRegistry()
      .register('b', { positive: staticProducer(() => 1) })
      .register('a', { positive: staticProducer(() => 2) })
      .register('b', { positive: staticProducer(() => 3) });

    assert.deepStrictEqual(registry.list(), ['b', 'a']);
    assert.strictEqual(produceStatic(registry, 'b', 'positive'), 3);
  });

  it('should report contextual types', () => {
    const registry = new GeneratorRegistry()
      .register('plain', { positive: staticProducer(() => 'x') })
      .register('prompted', { positive: contextualProducer(async (context) => context) });

    assert.strictEqual(registry.isContextual('plain'), false);
    assert.strictEqual(registry.isContextual('prompted'), true);
    assert.strictEqual(registry.isContextual('missing'), false);
  });
});

describe('createDefaultRegistry', () => {
  const faker = createFaker('en_IN', 1234);
  const registry = createDefaultRegistry({ faker, capability: unavailable });

  it('should register the built-in types', () => {
    assert.deepStrictEqual(registry.list(), ['name', 'email', 'password', 'integer', 'date', 'uuid', AI_TEXT_TYPE]);
  });

  it('should produce valid positive values', () => {
    const email = produceStatic(registry, 'email', 'positive');
    assert.match(String(email), /^[^@\s]+@example\.(com|net|org)$/);

    const password = produceStatic(registry, 'password', 'positive');
    assert.strictEqual(String(password).length, 12);

    const integer = produceStatic(registry, 'integer', 'positive');
    assert.ok(typeof integer === 'number' && Number.isInteger(integer) && integer >= 0 && integer <= 9999);

    const date = String(produceStatic(registry, 'date', 'positive'));
    assert.match(date, /^\d{4}-\d{2}-\d{2}$/);
    assert.ok(date >= '1970-01-01' && date <= '2030-12-31');

    assert.match(
      String(produceStatic(registry, 'uuid', 'positive')),
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );

    assert.ok(String(produceStatic(registry, 'name', 'positive')).length > 0);
  });

  it('should produce values from the fixed invalid sets', () => {
    assert.strictEqual(produceStatic(registry, 'email', 'negative'), 'not-an-email');
    assert.strictEqual(produceStatic(registry, 'password', 'negative'), '123');
    assert.strictEqual(produceStatic(registry, 'date', 'negative'), '2025-99-99');
    assert.strictEqual(produceStatic(registry, 'uuid', 'negative'), 'not-a-uuid');

    for (let i = 0; i < 20; i++) {
      assert.ok(['', 'Name123', 'A'.repeat(201)].includes(String(produceStatic(registry, 'name', 'negative'))));
      const integer = produceStatic(registry, 'integer', 'negative');
      assert.ok(integer === -1 || integer === 999.9 || integer === 'abc');
    }
  });

  it('should mark ai_text disabled without a text service', () => {
    assert.strictEqual(produceStatic(registry, AI_TEXT_TYPE, 'positive'), AI_DISABLED);
    assert.strictEqual(produceStatic(registry, AI_TEXT_TYPE, 'negative'), INVALID_AI_PROMPT);
    assert.strictEqual(registry.isContextual(AI_TEXT_TYPE), false);
  });

  it('should send the context prompt to the text service when available', async () => {
    const service = new ScriptedTextService((prompt) => `reply to ${prompt}`);
    const withService = createDefaultRegistry({ faker, capability: available(service) });

    const producer = withService.resolve(AI_TEXT_TYPE, 'positive');
    assert.ok(producer && producer.kind === 'contextual');

    assert.strictEqual(await producer.produce('a product review'), 'reply to a product review');
    assert.deepStrictEqual(service.calls, [{ prompt: 'a product review', options: undefined }]);
    assert.strictEqual(produceStatic(withService, AI_TEXT_TYPE, 'negative'), INVALID_AI_PROMPT);
  });

  it('should repeat values for the same seed', () => {
    const first = createDefaultRegistry({ faker: createFaker('en', 7), capability: unavailable });
    const second = createDefaultRegistry({ faker: createFaker('en', 7), capability: unavailable });

    assert.strictEqual(produceStatic(first, 'name', 'positive'), produceStatic(second, 'name', 'positive'));
    assert.strictEqual(produceStatic(first, 'uuid', 'positive'), produceStatic(second, 'uuid', 'positive'));
  });
});
