/**
 * Unit tests for utils/lifespan
 */

import { describe, it, expect } from 'vitest';
import { buildLifespan } from '../../../core/src/utils/lifespan.js';
import { createDeceasedPerson, createLivingPerson } from '../../../core/src/lib/family/person.js';
import { parseCalendarDate as d } from '../../../core/src/utils/calendarDate.js';

describe('buildLifespan', () => {
  it('shows birth and death years for deceased persons', () => {
    expect(buildLifespan(createDeceasedPerson('Otto', d('1965-08-15'), d('2020-04-10')))).toBe('1965-2020');
  });

  it('leaves the death year open for living persons', () => {
    expect(buildLifespan(createLivingPerson('Emma', d('1995-02-28')))).toBe('1995-');
  });
});
