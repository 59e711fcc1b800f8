/**
 * Plain-text rendering of query results for the console.
 */

import type { BirthdayCalendarEntry, ChildrenStatistics, RelationshipQuery } from '@family-graph/shared';
import type { Person } from '../../core/src/index.js';

export const RELATIONSHIP_LABELS: Record<RelationshipQuery, string> = {
  parents: 'Parents',
  grandparents: 'Grandparents',
  siblings: 'Siblings',
  cousins: 'Cousins',
  immediate: 'Immediate Family',
  extended: 'Extended Family',
};

const pad2 = (n: number): string => String(n).padStart(2, '0');

export const formatNames = (people: readonly Person[]): string =>
  `[${people.map((person) => person.name).join(', ')}]`;

// e.g. "Siblings of Emma Emmersohn: [Lucas Emmersohn]"
export const formatRelationship = (
  kind: RelationshipQuery,
  name: string,
  people: readonly Person[]
): string => `${RELATIONSHIP_LABELS[kind]} of ${name}: ${formatNames(people)}`;

// Day first, as in "28/02: Emma Emmersohn"
export const formatBirthdayLine = (entry: BirthdayCalendarEntry): string =>
  `${pad2(entry.day)}/${pad2(entry.month)}: ${entry.names.join(', ')}`;

export const formatBirthdayCalendar = (entries: BirthdayCalendarEntry[]): string[] => [
  'Family Birthday Calendar:',
  ...entries.map(formatBirthdayLine),
];

export const formatAverageAge = (average: number): string =>
  `The average age at death is: ${average.toFixed(2)} years`;

export const formatChildrenStatistics = (stats: ChildrenStatistics): string[] => [
  'Number of children per individual:',
  ...[...stats.counts].map(([name, count]) => `${name}: ${count}`),
  `The average number of children per person is: ${stats.average.toFixed(2)}`,
];
