/**
 * Family graph core: person entity, relationship queries, statistics and the registry.
 */

export * from './lib/family/person.js';
export * from './lib/family/relationships.js';
export * from './lib/family/statistics.js';
export * from './lib/family/registry.js';
export * from './lib/family/integrity.js';
export * from './lib/family/seed.js';
export { parseFamilySeed } from './lib/family/seedSchema.js';
export * from './lib/errors.js';
export { logger } from './lib/logger.js';
export { config, loadConfig, type FamilyGraphConfig } from './lib/config.js';
export * from './utils/calendarDate.js';
export { buildLifespan } from './utils/lifespan.js';
export { familyService, loadFamilySeedFile } from './services/family.service.js';
