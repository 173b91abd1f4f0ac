/**
 * Faker instances per locale. Each call builds a fresh instance so that
 * seeding one engine never affects another.
 */

import { Faker, base, de, en, en_GB, en_IN, en_US, fr } from '@faker-js/faker';
import type { LocaleDefinition } from '@faker-js/faker';
import type { DataLocale } from '../../config/env.js';

const LOCALE_CHAINS: Record<DataLocale, LocaleDefinition[]> = {
  en: [en, base],
  en_US: [en_US, en, base],
  en_GB: [en_GB, en, base],
  en_IN: [en_IN, en, base],
  de: [de, en, base],
  fr: [fr, en, base],
};

export function createFaker(locale: DataLocale = 'en_IN', seed?: number): Faker {
  const faker = new Faker({ locale: LOCALE_CHAINS[locale] });
  if (seed !== undefined) {
    faker.seed(seed);
  }
  return faker;
}
