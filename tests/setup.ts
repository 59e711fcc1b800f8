/**
 * Global test setup for the family graph suite
 */

import { beforeAll, afterEach } from 'vitest';
import { config } from '../core/src/lib/config.js';
import { familyService } from '../core/src/services/family.service.js';

// Keep loader and registry logging out of test output, including suites
// that build registries while collecting tests
config.logSilent = true;

// Global setup - runs once before all tests in a file
beforeAll(() => {
  process.env.NODE_ENV = 'test';
});

// Reset after each test
afterEach(() => {
  familyService.reset();
});
