import type { DashboardBundle } from '../types.ts';

export function bundle(totalArticles: number, categories: string[] = []): DashboardBundle {
  return {
    datasetVersion: 'abc123def456',
    criteria: { categories, locationUnits: [], dateFrom: null, dateTo: null },
    summary: { totalArticles, uniqueSources: 1, uniqueCountries: 1, uniqueLocations: 1 },
    categoryCounts: Object.fromEntries(categories.map(c => [c, 1])),
    sentimentCounts: {},
    topCategories: [],
    topLocations: [],
    topLocationCategory: [],
    timeSeries: [{ date: '2024-01-03', count: totalArticles }],
    timeSeriesByCategory: [],
    mapPoints: [],
    table: [],
  };
}

export function ok(data: unknown): Response {
  return new Response(JSON.stringify({ success: true, data }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function fail(status: number, error: string, details?: string[]): Response {
  return new Response(JSON.stringify({ success: false, error, details }), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** A promise the test settles by hand. */
export function deferred<T>() {
  let resolve: (v: T) => void = () => {};
  const promise = new Promise<T>(r => { resolve = r; });
  return { promise, resolve };
}
