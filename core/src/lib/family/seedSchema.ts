import { z } from 'zod';
import type { FamilySeed } from '@family-graph/shared';
import { FamilyGraphError } from '../errors.js';

const nameSchema = z.string().trim().min(1);
const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const personSeedSchema = z.object({
  name: nameSchema,
  birthDate: isoDateSchema,
  deathDate: isoDateSchema.optional(),
  parents: z.array(nameSchema).optional(),
  children: z.array(nameSchema).optional(),
  spouse: nameSchema.optional(),
});

export const familySeedSchema = z.object({
  name: z.string().optional(),
  members: z.array(personSeedSchema),
}) satisfies z.ZodType<FamilySeed>;

/**
 * Validate untrusted JSON (e.g. a parsed seed file) as a FamilySeed.
 */
export function parseFamilySeed(json: unknown): FamilySeed {
  const result = familySeedSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new FamilyGraphError('INVALID_SEED', `Invalid family seed: ${issues}`);
  }
  return result.data;
}
