/**
 * filter-builder.ts — Raw widget values → FilterCriteria
 *
 * Empty or missing selections mean "no restriction" for that
 * dimension. A date range applies only when both bounds are
 * present; a lone bound is ignored. An inverted range or a
 * malformed day is rejected with InvalidCriteriaError.
 */
import { z } from 'zod';
import { InvalidCriteriaError } from '../shared/errors.ts';
import { cleanList, compareKeys, isDayKey } from './helpers.ts';
import type { CriteriaSnapshot, FilterCriteria, RawSelection } from '../types.ts';

const selectionList = z
  .union([z.string(), z.array(z.string())])
  .nullish()
  .transform(v => (v == null ? [] : cleanList(typeof v === 'string' ? [v] : v)));

// Date pickers may send a full timestamp; only the day matters.
const dayBound = z
  .string()
  .nullish()
  .transform(v => (v == null || v.trim() === '' ? null : v.trim().slice(0, 10)))
  .refine(v => v === null || isDayKey(v), { message: 'Expected a date as YYYY-MM-DD' });

export const RawSelectionSchema = z
  .object({
    categories: selectionList,
    locationUnits: selectionList,
    dateFrom: dayBound,
    dateTo: dayBound,
  })
  .superRefine((s, ctx) => {
    if (s.dateFrom !== null && s.dateTo !== null && s.dateFrom > s.dateTo) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['dateFrom'],
        message: `dateFrom ${s.dateFrom} is after dateTo ${s.dateTo}`,
      });
    }
  });

export function buildCriteria(raw: RawSelection = {}): FilterCriteria {
  const result = RawSelectionSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidCriteriaError(result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }

  const { categories, locationUnits, dateFrom, dateTo } = result.data;
  return {
    categories: new Set(categories),
    locationUnits: new Set(locationUnits),
    dateRange: dateFrom !== null && dateTo !== null ? { from: dateFrom, to: dateTo } : null,
  };
}

/** Plain, order-independent form used in bundles and cache keys. */
export function snapshotCriteria(c: FilterCriteria): CriteriaSnapshot {
  return {
    categories: [...c.categories].sort(compareKeys),
    locationUnits: [...c.locationUnits].sort(compareKeys),
    dateFrom: c.dateRange?.from ?? null,
    dateTo: c.dateRange?.to ?? null,
  };
}

export function isUnrestricted(c: FilterCriteria): boolean {
  return c.categories.size === 0 && c.locationUnits.size === 0 && c.dateRange === null;
}
