/**
 * Unit tests for services/family.service
 * Tests loading seed files and name-based queries
 */

import { describe, it, expect } from 'vitest';
import { familyService, loadFamilySeedFile } from '../../../core/src/services/family.service.js';
import { config } from '../../../core/src/lib/config.js';
import { captureError, fixturePath, namesOf, SAMPLE_FAMILY_FILE } from '../../utils/fixtures.js';

describe('familyService', () => {
  describe('loadFamilySeedFile', () => {
    it('reads and validates a seed file', () => {
      const seed = loadFamilySeedFile(fixturePath('families/half-cousins.json'));
      expect(seed.name).toBe('Alder-Birch');
      expect(seed.members).toHaveLength(8);
    });

    it('reports a missing file with SEED_NOT_FOUND', () => {
      const err = captureError(() => loadFamilySeedFile(fixturePath('families/does-not-exist.json')));
      expect(err).toMatchObject({ code: 'SEED_NOT_FOUND' });
    });

    it('reports unparseable JSON with INVALID_SEED', () => {
      const err = captureError(() => loadFamilySeedFile(fixturePath('families/not-json.json')));
      expect(err).toMatchObject({ code: 'INVALID_SEED' });
    });
  });

  describe('getRegistry', () => {
    it('builds the registry once per file', () => {
      const first = familyService.getRegistry(SAMPLE_FAMILY_FILE);
      expect(familyService.getRegistry(SAMPLE_FAMILY_FILE)).toBe(first);
    });

    it('rebuilds after reset', () => {
      const first = familyService.getRegistry(SAMPLE_FAMILY_FILE);
      familyService.reset();
      expect(familyService.getRegistry(SAMPLE_FAMILY_FILE)).not.toBe(first);
    });

    it('uses the configured family file by default', () => {
      const previous = config.familyFile;
      config.familyFile = fixturePath('families/half-cousins.json');
      try {
        expect(familyService.getRegistry().has('Xavier Alder')).toBe(true);
      } finally {
        config.familyFile = previous;
      }
    });
  });

  describe('query', () => {
    it('runs a relationship query for a known name', () => {
      const result = familyService.query('grandparents', 'Emma Emmersohn', SAMPLE_FAMILY_FILE);
      expect(result.found).toBe(true);
      if (!result.found) return;
      expect(result.name).toBe('Emma Emmersohn');
      expect(namesOf(result.value)).toEqual(['Anna Singh', 'Raj Singh', 'Maria Müller', 'Hans Emmersohn']);
    });

    it('returns found: false for an unknown name', () => {
      expect(familyService.query('siblings', 'Nobody', SAMPLE_FAMILY_FILE)).toEqual({
        found: false,
        name: 'Nobody',
      });
    });

    it('preserves duplicate cousins from overlapping routes', () => {
      const result = familyService.query('cousins', 'Xavier Alder', fixturePath('families/half-cousins.json'));
      expect(result.found && namesOf(result.value)).toEqual(['Cleo Alder-Birch', 'Cleo Alder-Birch']);
    });
  });
});
