/**
 * Value Generator Registry
 *
 * Maps a type name to its positive and negative producers. The default
 * table covers the built-in types; more can be registered at startup.
 */

import type { Faker } from '@faker-js/faker';
import type {
  ContextualProducer,
  FieldCase,
  FieldValue,
  GeneratorEntry,
  StaticProducer,
  TypeName,
  ValueProducer,
} from './types.js';
import { AI_DISABLED, INVALID_AI_PROMPT } from './sentinels.js';
import type { TextCapability } from '../../llm/text-service.js';

export const AI_TEXT_TYPE = 'ai_text';

export function staticProducer(produce: () => FieldValue): StaticProducer {
  return { kind: 'static', produce };
}

export function contextualProducer(produce: (context: string) => Promise<FieldValue>): ContextualProducer {
  return { kind: 'contextual', produce };
}

export class GeneratorRegistry {
  private readonly entries = new Map<TypeName, GeneratorEntry>();

  /**
   * Add or replace the generators for a type
   */
  register(typeName: TypeName, entry: GeneratorEntry): this {
    this.entries.set(typeName, entry);
    return this;
  }

  /**
   * Look up the producer for a type and case; undefined on a miss
   */
  resolve(typeName: TypeName, fieldCase: FieldCase): ValueProducer | undefined {
    return this.entries.get(typeName)?.[fieldCase];
  }

  has(typeName: TypeName): boolean {
    return this.entries.has(typeName);
  }

  /**
   * Registered type names in registration order
   */
  list(): TypeName[] {
    return [...this.entries.keys()];
  }

  /**
   * Whether any producer of the type consumes a context prompt
   */
  isContextual(typeName: TypeName): boolean {
    const entry = this.entries.get(typeName);
    return entry?.positive?.kind === 'contextual' || entry?.negative?.kind === 'contextual';
  }
}

export interface DefaultRegistryOptions {
  faker: Faker;
  capability: TextCapability;
}

/**
 * Build the registry of built-in types.
 * Whether ai_text calls the text service is fixed here, once.
 */
export function createDefaultRegistry({ faker, capability }: DefaultRegistryOptions): GeneratorRegistry {
  const registry = new GeneratorRegistry();

  registry
    .register('name', {
      positive: staticProducer(() => faker.person.fullName()),
      negative: staticProducer(() => faker.helpers.arrayElement(['', 'Name123', 'A'.repeat(201)])),
    })
    .register('email', {
      positive: staticProducer(() => faker.internet.exampleEmail()),
      negative: staticProducer(() => 'not-an-email'),
    })
    .register('password', {
      positive: staticProducer(() => faker.internet.password({ length: 12 })),
      negative: staticProducer(() => '123'),
    })
    .register('integer', {
      positive: staticProducer(() => faker.number.int({ min: 0, max: 9999 })),
      negative: staticProducer(() => faker.helpers.arrayElement<FieldValue>([-1, 999.9, 'abc'])),
    })
    .register('date', {
      positive: staticProducer(() =>
        faker.date.between({ from: '1970-01-01T00:00:00Z', to: '2030-12-31T00:00:00Z' }).toISOString().slice(0, 10)
      ),
      negative: staticProducer(() => '2025-99-99'),
    })
    .register('uuid', {
      positive: staticProducer(() => faker.string.uuid()),
      negative: staticProducer(() => 'not-a-uuid'),
    });

  if (capability.status === 'available') {
    const service = capability.service;
    registry.register(AI_TEXT_TYPE, {
      positive: contextualProducer((context) => service.generate(context)),
      negative: staticProducer(() => INVALID_AI_PROMPT),
    });
  } else {
    registry.register(AI_TEXT_TYPE, {
      positive: staticProducer(() => AI_DISABLED),
      negative: staticProducer(() => INVALID_AI_PROMPT),
    });
  }

  return registry;
}
