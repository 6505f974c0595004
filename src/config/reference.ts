import { readFile } from 'fs/promises';
import { z } from 'zod';
import { config } from './env';
import { parseStructuredPayload } from '../utils/structured-payload';
import { createScopedLogger } from '../utils/logger';
import { TakeoffError, describeError } from '../utils/takeoff-error';

const log = createScopedLogger('Reference');

export const UNKNOWN_REFERENCE_CATEGORY = 'Unknown';

const referenceSetSchema = z.record(z.record(z.number().min(0)));

/** Hand-counted quantities grouped by category, e.g. `{ lighting: { F2: 40 } }`. */
export type ReferenceSet = z.infer<typeof referenceSetSchema>;

export const parseReferenceSet = (raw: string): ReferenceSet => {
  const payload = parseStructuredPayload(raw, 'INVALID_REFERENCE', 'Reference set');
  const result = referenceSetSchema.safeParse(payload);
  if (!result.success) {
    throw new TakeoffError(
      'INVALID_REFERENCE',
      'Reference set must map categories to item quantities',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
};

export const loadReferenceSet = async (
  path: string | undefined = config.referencePath,
): Promise<ReferenceSet | null> => {
  if (!path) {
    return null;
  }
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    log.error(`Unable to read reference set ${path}`, describeError(error));
    throw new TakeoffError('INVALID_REFERENCE', `Unable to read reference set at ${path}`);
  }
  return parseReferenceSet(raw);
};

/** Later categories win when the same item appears twice. */
export const flattenReference = (reference: ReferenceSet): Record<string, number> => {
  const flat: Record<string, number> = {};
  for (const items of Object.values(reference)) {
    Object.assign(flat, items);
  }
  return flat;
};

export const createCategoryLookup = (reference: ReferenceSet) => {
  const categories = new Map<string, string>();
  for (const [category, items] of Object.entries(reference)) {
    for (const item of Object.keys(items)) {
      categories.set(item, category);
    }
  }
  return (item: string): string => categories.get(item) ?? UNKNOWN_REFERENCE_CATEGORY;
};
