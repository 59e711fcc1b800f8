/**
 * Unit tests for lib/logger
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { config } from '../../../core/src/lib/config.js';
import { logger } from '../../../core/src/lib/logger.js';
import { buildTestFamily, createSeedMember } from '../../utils/fixtures.js';

describe('logger', () => {
  beforeEach(() => {
    config.logSilent = false;
  });

  afterEach(() => {
    config.logSilent = true;
    vi.restoreAllMocks();
  });

  it('prefixes lines with the category icon and context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    logger.query('parents', 'No member named "Nobody"');
    expect(log).toHaveBeenCalledWith('🔍 [parents] No member named "Nobody"');
  });

  it('sends warnings and errors to their own console channels', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    logger.warn('registry', 'careful');
    logger.error('family', 'broken');
    expect(warn).toHaveBeenCalledWith('⚠️ [registry] careful');
    expect(error).toHaveBeenCalledWith('❌ [family] broken');
  });

  it('logs each parent link made while building a seed', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    buildTestFamily([
      createSeedMember({ name: 'Mum', children: ['Kid'] }),
      createSeedMember({ name: 'Dad' }),
      createSeedMember({ name: 'Kid', parents: ['Dad'] }),
    ]);
    expect(log).toHaveBeenCalledWith('🔗 [seed] Kid <- Dad, Mum');
  });

  it('stays quiet while logSilent is set', () => {
    config.logSilent = true;
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    logger.seed('seed', 'Reading family.json');
    expect(log).not.toHaveBeenCalled();
  });
});
