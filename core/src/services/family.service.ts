import fs from 'fs';
import path from 'path';
import type { FamilySeed, QueryResult, RelationshipQuery } from '@family-graph/shared';
import { config } from '../lib/config.js';
import { FamilyGraphError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { Person } from '../lib/family/person.js';
import type { FamilyRegistry } from '../lib/family/registry.js';
import { buildFamilyRegistry } from '../lib/family/seed.js';
import { parseFamilySeed } from '../lib/family/seedSchema.js';

/**
 * Read and validate a seed file. Relative paths resolve against the working directory.
 */
export function loadFamilySeedFile(filePath: string): FamilySeed {
  const fullPath = path.resolve(filePath);
  if (!fs.existsSync(fullPath)) {
    throw new FamilyGraphError('SEED_NOT_FOUND', `Family file not found: ${fullPath}`);
  }
  logger.seed('seed', `Reading ${fullPath}`);
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(fullPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FamilyGraphError('INVALID_SEED', `${fullPath} is not valid JSON: ${reason}`);
  }
  return parseFamilySeed(json);
}

// Registry for the configured family file, built on first use
let cached: { file: string; registry: FamilyRegistry } | null = null;

function getRegistry(file: string = config.familyFile): FamilyRegistry {
  if (cached && cached.file === file) return cached.registry;
  const registry = buildFamilyRegistry(loadFamilySeedFile(file));
  cached = { file, registry };
  return registry;
}

export const familyService = {
  getRegistry,

  query(kind: RelationshipQuery, name: string, file?: string): QueryResult<readonly Person[]> {
    const registry = getRegistry(file);
    const person = registry.get(name);
    if (!person) {
      logger.query(kind, `No member named "${name}"`);
      return { found: false, name };
    }
    return { found: true, name, value: registry.query(kind, person) };
  },

  reset(): void {
    cached = null;
  },
};
