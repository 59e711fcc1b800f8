import type { Person } from '../lib/family/person.js';

/**
 * Build a human-readable lifespan string from a person's vital dates.
 * Examples: "1965-2020", "1968-"
 */
export function buildLifespan(person: Person): string {
  const birth = String(person.birthDate.year);
  const death = person.status === 'deceased' ? String(person.deathDate.year) : '';
  return `${birth}-${death}`;
}
