/**
 * Aggregate statistics over every member of a registry.
 */

import type { BirthdayCalendarEntry, ChildrenStatistics } from '@family-graph/shared';
import { daysBetween } from '../../utils/calendarDate.js';
import type { Person } from './person.js';

// Anything that can list its members in a stable order
export interface MemberSource {
  members(): readonly Person[];
}

const DAYS_PER_YEAR = 365;

/**
 * Members grouped by birth month and day, ascending by (month, day).
 */
export function birthdayCalendar(registry: MemberSource): BirthdayCalendarEntry[] {
  const byDay = new Map<number, BirthdayCalendarEntry>();
  for (const person of registry.members()) {
    const { month, day } = person.birthDate;
    const key = month * 100 + day;
    const entry = byDay.get(key);
    if (entry) {
      entry.names.push(person.name);
    } else {
      byDay.set(key, { month, day, names: [person.name] });
    }
  }
  return [...byDay.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, entry]) => entry);
}

/**
 * Whole years lived, counting 365 days per year with no leap-year correction.
 * Null for living persons.
 */
export function ageAtDeath(person: Person): number | null {
  if (person.status !== 'deceased') return null;
  return Math.floor(daysBetween(person.birthDate, person.deathDate) / DAYS_PER_YEAR);
}

export function averageAgeAtDeath(registry: MemberSource): number {
  const ages = registry.members()
    .map(ageAtDeath)
    .filter((age): age is number => age !== null);
  if (ages.length === 0) return 0;
  return ages.reduce((sum, age) => sum + age, 0) / ages.length;
}

export function childrenStatistics(registry: MemberSource): ChildrenStatistics {
  const members = registry.members();
  const counts = new Map<string, number>();
  let total = 0;
  for (const person of members) {
    counts.set(person.name, person.children.length);
    total += person.children.length;
  }
  return {
    counts,
    average: members.length > 0 ? total / members.length : 0,
  };
}
