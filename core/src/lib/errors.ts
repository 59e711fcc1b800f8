export type FamilyGraphErrorCode =
  | 'INVALID_DATE'
  | 'DEATH_BEFORE_BIRTH'
  | 'ALREADY_LINKED'
  | 'INVALID_LINK'
  | 'UNKNOWN_PERSON'
  | 'UNKNOWN_MEMBER'
  | 'DUPLICATE_MEMBER'
  | 'CYCLE_DETECTED'
  | 'INVALID_SEED'
  | 'SEED_NOT_FOUND';

/**
 * Raised when a family graph cannot be constructed as requested.
 * Lookups of unknown names never raise; they return undefined.
 */
export class FamilyGraphError extends Error {
  readonly code: FamilyGraphErrorCode;

  constructor(code: FamilyGraphErrorCode, message: string) {
    super(message);
    this.name = 'FamilyGraphError';
    this.code = code;
  }
}

export const isFamilyGraphError = (err: unknown): err is FamilyGraphError =>
  err instanceof FamilyGraphError;
