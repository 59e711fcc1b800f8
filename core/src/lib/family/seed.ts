/**
 * Build a populated registry from a FamilySeed.
 *
 * Order of construction:
 *   1. create every person
 *   2. merge `parents` and `children` lists into one parent list per child
 *      (a pair may be listed from both sides) and link each child once,
 *      in member order
 *   3. apply spouses (setSpouse; a couple may be listed from both sides)
 *   4. check the finished graph
 */

import type { FamilySeed, PersonSeed } from '@family-graph/shared';
import { FamilyGraphError } from '../errors.js';
import { logger } from '../logger.js';
import { parseCalendarDate } from '../../utils/calendarDate.js';
import { assertFamilyIntegrity } from './integrity.js';
import {
  createDeceasedPerson,
  createLivingPerson,
  linkAsChildOf,
  setSpouse,
  type Person,
} from './person.js';
import { createFamilyRegistry, type FamilyRegistry } from './registry.js';

export function createPersonFromSeed(seed: PersonSeed): Person {
  const birthDate = parseCalendarDate(seed.birthDate);
  return seed.deathDate
    ? createDeceasedPerson(seed.name, birthDate, parseCalendarDate(seed.deathDate))
    : createLivingPerson(seed.name, birthDate);
}

export function buildFamilyRegistry(seed: FamilySeed): FamilyRegistry {
  const label = seed.name ?? 'family';
  logger.time('seed', label);

  const people = new Map<string, Person>();
  for (const member of seed.members) {
    if (people.has(member.name)) {
      throw new FamilyGraphError('DUPLICATE_MEMBER', `"${member.name}" appears more than once in the seed`);
    }
    people.set(member.name, createPersonFromSeed(member));
  }

  const resolve = (name: string, referencedBy: string): Person => {
    const person = people.get(name);
    if (!person) {
      throw new FamilyGraphError('UNKNOWN_MEMBER', `${referencedBy} references unknown member "${name}"`);
    }
    return person;
  };

  const parentsByChild = new Map<Person, Person[]>();
  const parentListOf = (child: Person): Person[] => {
    let parents = parentsByChild.get(child);
    if (!parents) {
      parents = [];
      parentsByChild.set(child, parents);
    }
    return parents;
  };

  for (const member of seed.members) {
    if (!member.parents?.length) continue;
    parentListOf(resolve(member.name, member.name)).push(
      ...member.parents.map((name) => resolve(name, member.name))
    );
  }

  for (const member of seed.members) {
    if (!member.children?.length) continue;
    const person = resolve(member.name, member.name);
    for (const name of member.children) {
      const parents = parentListOf(resolve(name, member.name));
      if (!parents.includes(person)) parents.push(person);
    }
  }

  for (const person of people.values()) {
    const parents = parentsByChild.get(person);
    if (!parents?.length) continue;
    linkAsChildOf(person, parents);
    logger.link('seed', `${person.name} <- ${parents.map((parent) => parent.name).join(', ')}`);
  }

  for (const member of seed.members) {
    if (!member.spouse) continue;
    setSpouse(resolve(member.name, member.name), resolve(member.spouse, member.name));
  }

  const members = [...people.values()];
  assertFamilyIntegrity(members);

  const registry = createFamilyRegistry(members);
  logger.seed('seed', `Built ${label} with ${registry.size} members`);
  logger.timeEnd('seed', label);
  return registry;
}
