/**
 * Relationship queries over the person graph.
 *
 * Every function is read-only and returns the same Person instances held by
 * the graph. "Unique" results keep first-seen order.
 */

import { isLiving, type LivingPerson, type Person } from './person.js';

const unique = (people: Iterable<Person>): Person[] => [...new Set(people)];

export const parentsOf = (person: Person): readonly Person[] => person.parents;

export const childrenOf = (person: Person): readonly Person[] => person.children;

/**
 * Parents of each parent, in parent order. A grandparent reachable through
 * both parents appears twice.
 */
export const grandparentsOf = (person: Person): Person[] =>
  person.parents.flatMap((parent) => parentsOf(parent));

/**
 * Everyone sharing at least one parent with `person` (half-siblings included).
 */
export const siblingsOf = (person: Person): Person[] =>
  unique(person.parents.flatMap((parent) => childrenOf(parent)))
    .filter((sibling) => sibling !== person);

export const auntsAndUnclesOf = (person: Person): Person[] =>
  unique(person.parents.flatMap((parent) => siblingsOf(parent)));

/**
 * Children of each parent's siblings, concatenated per parent. A cousin
 * reached through both parents' sibling sets is listed once per route.
 */
export const cousinsOf = (person: Person): Person[] => {
  const cousins: Person[] = [];
  for (const parent of person.parents) {
    for (const auntOrUncle of siblingsOf(parent)) {
      cousins.push(...auntOrUncle.children);
    }
  }
  return cousins;
};

export const uniqueCousinsOf = (person: Person): Person[] => unique(cousinsOf(person));

/**
 * Parents, siblings, spouse and children, each listed once.
 */
export const immediateFamilyOf = (person: Person): Person[] => {
  const family: Person[] = [...person.parents, ...siblingsOf(person)];
  if (person.spouse) family.push(person.spouse);
  family.push(...person.children);
  return unique(family);
};

/**
 * Immediate family plus aunts, uncles and cousins, restricted to living
 * relatives. Immediate family is not filtered this way.
 */
export const extendedFamilyOf = (person: Person): LivingPerson[] => {
  const family: Person[] = immediateFamilyOf(person);
  for (const parent of person.parents) {
    for (const auntOrUncle of siblingsOf(parent)) {
      family.push(auntOrUncle, ...auntOrUncle.children);
    }
  }
  return unique(family).filter(isLiving);
};
