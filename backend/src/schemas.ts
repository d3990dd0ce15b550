// ═══════════════════════════════════════════════════════
// Zod Schemas — Input validation for every API endpoint
// Criteria semantics (both-or-neither dates, inverted
// ranges) live in services/filter-builder.ts; these only
// shape the transport.
// ═══════════════════════════════════════════════════════
import { z } from 'zod';
import { asList } from './services/helpers.ts';
import type { RawSelection } from './types.ts';

// ── Shared pieces ──

// ?categories=a&categories=b; "a,b" is one value
const listParam = z
  .union([z.string().max(2000), z.array(z.string().max(200)).max(200)])
  .optional()
  .transform(v => asList(v));

const dayParam = z.string().max(40).optional();

const selectionShape = {
  categories: listParam,
  locationUnits: listParam,
  dateFrom: dayParam,
  dateTo: dayParam,
};

// ── GET /api/dashboard ──

export const DashboardQuerySchema = z.object(selectionShape);

// ── GET /api/articles ──

export const ArticlesQuerySchema = z.object({
  ...selectionShape,
  page: z.coerce.number().int().min(1).max(100_000).default(1),
  limit: z.coerce.number().int().min(1).max(200).default(10),
});

// ── POST /api/sessions/:id/filters ──

export const SessionParamSchema = z.object({
  id: z.string().regex(/^[a-zA-Z0-9_-]{1,64}$/, 'Invalid session ID'),
});

export const SelectionBodySchema = z.object({
  categories: z.union([z.string(), z.array(z.string().max(200)).max(200)]).nullish(),
  locationUnits: z.union([z.string(), z.array(z.string().max(200)).max(200)]).nullish(),
  dateFrom: z.string().max(40).nullish(),
  dateTo: z.string().max(40).nullish(),
});

export function toRawSelection(q: z.infer<typeof DashboardQuerySchema>): RawSelection {
  return { categories: q.categories, locationUnits: q.locationUnits, dateFrom: q.dateFrom, dateTo: q.dateTo };
}
