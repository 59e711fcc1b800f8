/**
 * Family registry: owns the name -> Person mapping and dispatches queries to
 * the relationship and statistics modules. Populated once, then read-only.
 */

import type { BirthdayCalendarEntry, ChildrenStatistics, RelationshipQuery } from '@family-graph/shared';
import { logger } from '../logger.js';
import { describePerson, type LivingPerson, type Person } from './person.js';
import {
  cousinsOf,
  extendedFamilyOf,
  grandparentsOf,
  immediateFamilyOf,
  parentsOf,
  siblingsOf,
} from './relationships.js';
import { averageAgeAtDeath, birthdayCalendar, childrenStatistics } from './statistics.js';

export const PERSON_NOT_FOUND = 'Person not found.';

export const relationshipQueries: Record<RelationshipQuery, (person: Person) => readonly Person[]> = {
  parents: parentsOf,
  grandparents: grandparentsOf,
  siblings: siblingsOf,
  cousins: cousinsOf,
  immediate: immediateFamilyOf,
  extended: extendedFamilyOf,
};

export interface FamilyRegistry {
  readonly size: number;
  get(name: string): Person | undefined;
  has(name: string): boolean;
  names(): string[];
  members(): Person[];
  describe(name: string): string;

  parentsOf(person: Person): readonly Person[];
  grandparentsOf(person: Person): Person[];
  siblingsOf(person: Person): Person[];
  cousinsOf(person: Person): Person[];
  immediateFamilyOf(person: Person): Person[];
  extendedFamilyOf(person: Person): LivingPerson[];
  query(kind: RelationshipQuery, person: Person): readonly Person[];

  birthdayCalendar(): BirthdayCalendarEntry[];
  averageAgeAtDeath(): number;
  childrenStatistics(): ChildrenStatistics;
}

export function createFamilyRegistry(initial: Iterable<Person> = []): FamilyRegistry {
  const byName = new Map<string, Person>();
  for (const person of initial) {
    // Last registration wins; Map keeps the original insertion slot
    if (byName.has(person.name)) {
      logger.warn('registry', `Replacing existing member "${person.name}"`);
    }
    byName.set(person.name, person);
  }

  const registry: FamilyRegistry = {
    get size() {
      return byName.size;
    },

    get: (name) => byName.get(name),
    has: (name) => byName.has(name),
    names: () => [...byName.keys()],
    members: () => [...byName.values()],

    describe(name: string): string {
      const person = byName.get(name);
      return person ? describePerson(person) : PERSON_NOT_FOUND;
    },

    parentsOf,
    grandparentsOf,
    siblingsOf,
    cousinsOf,
    immediateFamilyOf,
    extendedFamilyOf,
    query: (kind, person) => relationshipQueries[kind](person),

    birthdayCalendar: () => birthdayCalendar(registry),
    averageAgeAtDeath: () => averageAgeAtDeath(registry),
    childrenStatistics: () => childrenStatistics(registry),
  };

  return registry;
}
