/**
 * Relationship query kinds understood by the family service and the CLI.
 */

export type RelationshipQuery =
  | 'parents'
  | 'grandparents'
  | 'siblings'
  | 'cousins'
  | 'immediate'
  | 'extended';

// Result of a name-based query; `found: false` stands in for an unknown name
export type QueryResult<T> =
  | { found: true; name: string; value: T }
  | { found: false; name: string };
