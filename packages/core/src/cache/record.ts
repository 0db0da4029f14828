import { z } from 'zod';
import { CacheCorruptionError, type CostEntry } from '@rebisect/shared';

export const CostRecordSchema = z.object({
  signature: z.string().min(1),
  revision: z.string().min(1),
  cost: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  measuredAt: z.string().datetime(),
});

/** Decodes one line of the cost store; throws CacheCorruptionError when it cannot. */
export function parseCostRecord(line: string, location: string): CostEntry {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    throw new CacheCorruptionError(location, 'not valid JSON', { cause: error });
  }

  const result = CostRecordSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(record)'}: ${i.message}`)
      .join('; ');
    throw new CacheCorruptionError(location, issues);
  }
  return result.data;
}

export function serializeCostRecord(entry: CostEntry): string {
  return JSON.stringify({
    signature: entry.signature,
    revision: entry.revision,
    cost: entry.cost,
    measuredAt: entry.measuredAt,
  });
}
