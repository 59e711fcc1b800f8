// Re-export query kinds
export * from './query-types.js';

// Calendar date without time or zone (month is 1-12)
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export type PersonStatus = 'living' | 'deceased';

// ============================================================================
// Seed Data (JSON description a registry is built from)
// ============================================================================

// One member of a seed file. Relations reference other members by name.
export interface PersonSeed {
  name: string;                // Unique within the seed
  birthDate: string;           // ISO YYYY-MM-DD
  deathDate?: string;          // Present only for deceased members
  parents?: string[];          // Merged with other members' `children` lists
  children?: string[];         // Either side may state a parent-child pair
  spouse?: string;
}

export interface FamilySeed {
  name?: string;               // Display name of the family, e.g. "Emmersohn"
  members: PersonSeed[];
}

// ============================================================================
// Statistics
// ============================================================================

export interface BirthdayCalendarEntry {
  month: number;
  day: number;
  names: string[];             // Registry order
}

export interface ChildrenStatistics {
  counts: Map<string, number>; // name -> number of children, registry order
  average: number;             // Over all members, 0 when empty
}
