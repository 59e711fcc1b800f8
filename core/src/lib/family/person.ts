/**
 * Person entity: identity, vital dates and parent/child/spouse links.
 *
 * Identity fields are fixed at construction. Links are exposed as read-only
 * views and change only through linkAsChildOf, linkAsParentOf and setSpouse,
 * each of which updates both ends of the relationship in one call.
 */

import type { CalendarDate, PersonStatus } from '@family-graph/shared';
import { FamilyGraphError } from '../errors.js';
import { compareCalendarDates, formatCalendarDate } from '../../utils/calendarDate.js';

interface PersonBase {
  readonly status: PersonStatus;
  readonly name: string;
  readonly birthDate: CalendarDate;
  readonly parents: readonly Person[];
  readonly children: readonly Person[];
  readonly spouse: Person | null;
}

export interface LivingPerson extends PersonBase {
  readonly status: 'living';
}

export interface DeceasedPerson extends PersonBase {
  readonly status: 'deceased';
  readonly deathDate: CalendarDate;
}

export type Person = LivingPerson | DeceasedPerson;

interface Links {
  parents: Person[];
  children: Person[];
  spouse: Person | null;
}

// Backing storage for every person built by the factories below
const links = new WeakMap<Person, Links>();

const linksOf = (person: Person): Links => {
  const state = links.get(person);
  if (!state) {
    throw new FamilyGraphError(
      'UNKNOWN_PERSON',
      `${person.name} was not created with createLivingPerson/createDeceasedPerson`
    );
  }
  return state;
};

export function createLivingPerson(name: string, birthDate: CalendarDate): LivingPerson {
  const state: Links = { parents: [], children: [], spouse: null };
  const person: LivingPerson = {
    status: 'living',
    name,
    birthDate,
    get parents() { return state.parents; },
    get children() { return state.children; },
    get spouse() { return state.spouse; },
  };
  links.set(person, state);
  return person;
}

export function createDeceasedPerson(
  name: string,
  birthDate: CalendarDate,
  deathDate: CalendarDate
): DeceasedPerson {
  if (compareCalendarDates(deathDate, birthDate) < 0) {
    throw new FamilyGraphError(
      'DEATH_BEFORE_BIRTH',
      `${name} cannot die (${formatCalendarDate(deathDate)}) before being born (${formatCalendarDate(birthDate)})`
    );
  }
  const state: Links = { parents: [], children: [], spouse: null };
  const person: DeceasedPerson = {
    status: 'deceased',
    name,
    birthDate,
    deathDate,
    get parents() { return state.parents; },
    get children() { return state.children; },
    get spouse() { return state.spouse; },
  };
  links.set(person, state);
  return person;
}

export const isLiving = (person: Person): person is LivingPerson => person.status === 'living';

export const isDeceased = (person: Person): person is DeceasedPerson => person.status === 'deceased';

const assertDistinctRelatives = (person: Person, relatives: readonly Person[], role: string): void => {
  const seen = new Set<Person>();
  for (const relative of relatives) {
    if (relative === person) {
      throw new FamilyGraphError('INVALID_LINK', `${person.name} cannot be their own ${role}`);
    }
    if (seen.has(relative)) {
      throw new FamilyGraphError('INVALID_LINK', `${relative.name} is listed twice as ${role} of ${person.name}`);
    }
    seen.add(relative);
  }
};

/**
 * Set `person`'s parents and add `person` to each parent's children.
 * A person's parents are set once; a second call is rejected.
 */
export function linkAsChildOf(person: Person, parents: readonly Person[]): void {
  const state = linksOf(person);
  const parentStates = parents.map(linksOf);
  if (state.parents.length > 0) {
    throw new FamilyGraphError('ALREADY_LINKED', `${person.name} already has parents`);
  }
  assertDistinctRelatives(person, parents, 'parent');

  state.parents = [...parents];
  for (const parentState of parentStates) {
    parentState.children.push(person);
  }
}

/**
 * Set `person`'s children and add `person` to each child's parents.
 * Children may already have other parents; the list itself is set once.
 */
export function linkAsParentOf(person: Person, children: readonly Person[]): void {
  const state = linksOf(person);
  const childStates = children.map(linksOf);
  if (state.children.length > 0) {
    throw new FamilyGraphError('ALREADY_LINKED', `${person.name} already has children`);
  }
  assertDistinctRelatives(person, children, 'child');
  for (const child of children) {
    if (child.parents.includes(person)) {
      throw new FamilyGraphError('ALREADY_LINKED', `${person.name} is already a parent of ${child.name}`);
    }
  }

  state.children = [...children];
  for (const childState of childStates) {
    childState.parents.push(person);
  }
}

/**
 * Marry `a` and `b`: both sides are linked, or neither is.
 */
export function setSpouse(a: Person, b: Person): void {
  const stateA = linksOf(a);
  const stateB = linksOf(b);
  if (a === b) {
    throw new FamilyGraphError('INVALID_LINK', `${a.name} cannot be their own spouse`);
  }
  if (stateA.spouse === b && stateB.spouse === a) return;
  for (const [person, state] of [[a, stateA], [b, stateB]] as const) {
    if (state.spouse) {
      throw new FamilyGraphError(
        'ALREADY_LINKED',
        `${person.name} is already married to ${state.spouse.name}`
      );
    }
  }

  stateA.spouse = b;
  stateB.spouse = a;
}

export function describePerson(person: Person): string {
  const birth = formatCalendarDate(person.birthDate);
  switch (person.status) {
    case 'living':
      return `Name: ${person.name}, Birth Date: ${birth} (Alive)`;
    case 'deceased':
      return `Name: ${person.name}, Birth Date: ${birth}, Death Date: ${formatCalendarDate(person.deathDate)}`;
  }
}
