/**
 * Fixture utilities for loading test data
 */

import { readFileSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { FamilySeed, PersonSeed } from '@family-graph/shared';
import { buildFamilyRegistry } from '../../core/src/lib/family/seed.js';
import type { FamilyRegistry } from '../../core/src/lib/family/registry.js';
import { parseFamilySeed } from '../../core/src/lib/family/seedSchema.js';
import type { Person } from '../../core/src/lib/family/person.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURES_DIR = join(__dirname, '..', '__fixtures__');
const DATA_DIR = join(__dirname, '..', '..', 'data');

export const SAMPLE_FAMILY_FILE = join(DATA_DIR, 'sample-family.json');

export const fixturePath = (relativePath: string): string => join(FIXTURES_DIR, relativePath);

/**
 * Load a JSON fixture file
 */
export const loadFixture = <T = unknown>(relativePath: string): T => {
  const fullPath = fixturePath(relativePath);
  if (!existsSync(fullPath)) {
    throw new Error(`Fixture not found: ${fullPath}`);
  }
  return JSON.parse(readFileSync(fullPath, 'utf-8'));
};

/**
 * Load and validate a family seed from tests/__fixtures__/families
 */
export const loadFamilyFixture = (name: string): FamilySeed =>
  parseFamilySeed(loadFixture(`families/${name}.json`));

/**
 * The eight-member Emmersohn family shipped in data/sample-family.json
 */
export const loadSampleFamily = (): FamilySeed =>
  parseFamilySeed(JSON.parse(readFileSync(SAMPLE_FAMILY_FILE, 'utf-8')));

/**
 * Create a seed member with defaults for the fields a test does not care about
 */
export const createSeedMember = (overrides: Partial<PersonSeed> = {}): PersonSeed => ({
  name: 'Test Person',
  birthDate: '1900-01-01',
  ...overrides,
});

export const buildTestFamily = (members: PersonSeed[]): FamilyRegistry =>
  buildFamilyRegistry({ name: 'test', members });

/**
 * Look a member up, failing the test instead of returning undefined
 */
export const memberOf = (registry: FamilyRegistry, name: string): Person => {
  const person = registry.get(name);
  if (!person) throw new Error(`Test family has no member "${name}"`);
  return person;
};

/**
 * Run `fn` and return what it threw, failing the test if nothing was thrown
 */
export const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
};

export const namesOf = (people: readonly Person[]): string[] => people.map((person) => person.name);

export default {
  loadFixture,
  loadFamilyFixture,
  loadSampleFamily,
  createSeedMember,
  buildTestFamily,
  memberOf,
  captureError,
  namesOf,
};
