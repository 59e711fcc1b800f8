/**
 * Construction-time checks on a finished person graph.
 * Detects broken back-links, one-sided marriages and people who are their own ancestor.
 */

import { FamilyGraphError } from '../errors.js';
import type { Person } from './person.js';

export function assertLinksConsistent(people: Iterable<Person>): void {
  for (const person of people) {
    for (const parent of person.parents) {
      if (!parent.children.includes(person)) {
        throw new FamilyGraphError('INVALID_LINK', `${parent.name} does not list ${person.name} as a child`);
      }
    }
    for (const child of person.children) {
      if (!child.parents.includes(person)) {
        throw new FamilyGraphError('INVALID_LINK', `${child.name} does not list ${person.name} as a parent`);
      }
    }
    if (person.spouse && person.spouse.spouse !== person) {
      throw new FamilyGraphError('INVALID_LINK', `${person.name} is married to ${person.spouse.name} on one side only`);
    }
  }
}

/**
 * Walk parent edges depth-first from every person. Reaching a person already
 * on the current path means they are their own ancestor.
 */
export function findAncestryCycle(people: Iterable<Person>): Person[] | null {
  const done = new Set<Person>();

  const visit = (person: Person, path: Person[]): Person[] | null => {
    const index = path.indexOf(person);
    if (index !== -1) return [...path.slice(index), person];
    if (done.has(person)) return null;

    path.push(person);
    for (const parent of person.parents) {
      const cycle = visit(parent, path);
      if (cycle) return cycle;
    }
    path.pop();
    done.add(person);
    return null;
  };

  for (const person of people) {
    const cycle = visit(person, []);
    if (cycle) return cycle;
  }
  return null;
}

export function assertFamilyIntegrity(people: readonly Person[]): void {
  assertLinksConsistent(people);
  const cycle = findAncestryCycle(people);
  if (cycle) {
    throw new FamilyGraphError(
      'CYCLE_DETECTED',
      `Cyclic ancestry: ${cycle.map((person) => person.name).join(' -> ')}`
    );
  }
}
