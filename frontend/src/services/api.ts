import type { z } from 'zod';
import type { DashboardBundle, DisplayRow, FilterOptions, Filters, SearchResults } from '../types.ts';
import { ArticlePageSchema, DashboardBundleSchema, EnvelopeSchema, FilterOptionsSchema } from './schemas.ts';

export class ApiError extends Error {
  constructor(message: string, readonly status: number, readonly details: string[] = []) {
    super(message);
    this.name = 'ApiError';
  }
}

let API = '';

/** Point the client at another origin (tests, split deployments). */
export function setApiBase(base: string): void {
  API = base.replace(/\/$/, '');
}

/**
 * GET an enveloped payload ({ success, data }) and validate data.
 * Non-2xx and success:false both become ApiError with the server's message.
 */
async function get<T>(path: string, schema: z.ZodType<T>, signal?: AbortSignal): Promise<T> {
  const res = await fetch(`${API}${path}`, { signal });
  const envelope = EnvelopeSchema.safeParse(await res.json());
  if (!envelope.success) throw new ApiError(`Malformed response from ${path}`, res.status);

  const { success, data, error, details } = envelope.data;
  if (!res.ok || !success) throw new ApiError(error || `API ${res.status}`, res.status, details);

  const parsed = schema.safeParse(data);
  if (!parsed.success) throw new ApiError(`Unexpected payload from ${path}`, res.status);
  return parsed.data;
}

/** Filters → query string. Lists repeat their key; unrestricted dimensions are left out. */
export function toQuery(filters: Partial<Filters>): string {
  const params = new URLSearchParams();
  for (const c of filters.categories ?? []) params.append('categories', c);
  for (const l of filters.locationUnits ?? []) params.append('locationUnits', l);
  if (filters.dateFrom) params.set('dateFrom', filters.dateFrom);
  if (filters.dateTo) params.set('dateTo', filters.dateTo);
  return params.toString();
}

export function fetchDashboard(filters: Partial<Filters> = {}, signal?: AbortSignal): Promise<DashboardBundle> {
  const qs = toQuery(filters);
  return get(qs ? `/api/dashboard?${qs}` : '/api/dashboard', DashboardBundleSchema, signal);
}

export function fetchFilterOptions(): Promise<FilterOptions> {
  return get('/api/filters', FilterOptionsSchema);
}

// Paginated detail table
export function fetchArticles(
  filters: Partial<Filters> = {},
  page = 1,
  limit = 10,
): Promise<SearchResults<DisplayRow>> {
  const sp = new URLSearchParams(toQuery(filters));
  sp.set('page', String(page));
  sp.set('limit', String(limit));
  return get(`/api/articles?${sp}`, ArticlePageSchema);
}
