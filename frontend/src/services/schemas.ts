// ═══════════════════════════════════════════════════════
// Response schemas — what the client accepts from the API
// ═══════════════════════════════════════════════════════
import { z } from 'zod';
import type { DashboardBundle, DisplayRow, FilterOptions, SearchResults } from '../types.ts';

const count = z.number().int().min(0);
const rank = z.object({ key: z.string(), count });
const point = z.object({ date: z.string(), group: z.string().optional(), count });

export const DisplayRowSchema: z.ZodType<DisplayRow> = z.object({
  date: z.string().nullable(),
  titleLink: z.string(),
  locationUnit: z.string(),
  category: z.string(),
  source: z.string(),
});

export const DashboardBundleSchema: z.ZodType<DashboardBundle> = z.object({
  datasetVersion: z.string(),
  criteria: z.object({
    categories: z.array(z.string()),
    locationUnits: z.array(z.string()),
    dateFrom: z.string().nullable(),
    dateTo: z.string().nullable(),
  }),
  summary: z.object({
    totalArticles: count,
    uniqueSources: count,
    uniqueCountries: count,
    uniqueLocations: count,
  }),
  categoryCounts: z.record(count),
  sentimentCounts: z.record(count),
  topCategories: z.array(rank),
  topLocations: z.array(rank),
  topLocationCategory: z.array(z.object({ keys: z.tuple([z.string(), z.string()]), count })),
  timeSeries: z.array(point),
  timeSeriesByCategory: z.array(point),
  mapPoints: z.array(z.object({
    id: z.number(),
    lat: z.number(),
    lon: z.number(),
    title: z.string(),
    category: z.string(),
    locationUnit: z.string(),
  })),
  table: z.array(DisplayRowSchema),
});

export const FilterOptionsSchema: z.ZodType<FilterOptions> = z.object({
  profile: z.string(),
  categoryLabel: z.string(),
  locationLabel: z.string(),
  categories: z.array(z.string()),
  locationUnits: z.array(z.string()),
  minDate: z.string().nullable(),
  maxDate: z.string().nullable(),
});

export const ArticlePageSchema: z.ZodType<SearchResults<DisplayRow>> = z.object({
  total: count,
  page: z.number().int(),
  pages: count,
  limit: z.number().int(),
  results: z.array(DisplayRowSchema),
});

export const EnvelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  details: z.array(z.string()).optional(),
});
