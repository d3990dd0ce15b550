/**
 * aggregator.ts — Views derived from one filtered subset
 *
 * Every function is pure and reads the rows it is handed; none of
 * them filter. Grouping uses Map so insertion order is first-seen
 * order, and Array#sort is stable, so equal counts keep the order
 * in which their keys first appeared in the subset.
 */
import { compareKeys, dayKey } from './helpers.ts';
import type {
  Article, CategoryCounts, CrossTabEntry, DimensionField, MapPoint,
  RankEntry, SummaryMetrics, TimeSeriesPoint,
} from '../types.ts';

type Rows = readonly Article[];

function tally<K>(rows: Rows, keyOf: (r: Article) => K | null): Map<K, number> {
  const counts = new Map<K, number>();
  for (const r of rows) {
    const k = keyOf(r);
    if (k === null) continue;
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return counts;
}

/** Like tally, for two-part keys. Parts are joined through JSON so "a|b" + "c" never meets "a" + "b|c". */
function tallyPairs(rows: Rows, keyOf: (r: Article) => [string, string] | null): Array<{ pair: [string, string]; count: number }> {
  const buckets = new Map<string, { pair: [string, string]; count: number }>();
  for (const r of rows) {
    const pair = keyOf(r);
    if (pair === null) continue;
    const k = JSON.stringify(pair);
    const b = buckets.get(k);
    if (b) b.count++;
    else buckets.set(k, { pair, count: 1 });
  }
  return [...buckets.values()];
}

function byCountDesc<T extends { count: number }>(a: T, b: T): number {
  return b.count - a.count;
}

// ═══ COUNTS ═══

export function countBy(rows: Rows, field: DimensionField): CategoryCounts {
  return Object.fromEntries(tally(rows, r => r[field]));
}

export function categoryCounts(rows: Rows): CategoryCounts {
  return countBy(rows, 'category');
}

// ═══ RANKINGS ═══

export function topN(rows: Rows, field: DimensionField, n: number): RankEntry[] {
  return [...tally(rows, r => r[field])]
    .map(([key, count]) => ({ key, count }))
    .sort(byCountDesc)
    .slice(0, n);
}

export function crossTabTopN(rows: Rows, fields: [DimensionField, DimensionField], n: number): CrossTabEntry[] {
  const [fa, fb] = fields;
  return tallyPairs(rows, r => [r[fa], r[fb]])
    .map(({ pair, count }) => ({ keys: pair, count }))
    .sort(byCountDesc)
    .slice(0, n);
}

// ═══ TIME SERIES ═══

/** Rows without a date carry no point in time and are left out. */
export function timeSeries(rows: Rows, groupField?: DimensionField): TimeSeriesPoint[] {
  if (!groupField) {
    return [...tally(rows, r => (r.publishedAt ? dayKey(r.publishedAt) : null))]
      .map(([date, count]) => ({ date, count }))
      .sort((a, b) => compareKeys(a.date, b.date));
  }

  const field = groupField;
  return tallyPairs(rows, r => (r.publishedAt ? [dayKey(r.publishedAt), r[field]] : null))
    .map(({ pair: [date, group], count }) => ({ date, group, count }))
    .sort((a, b) => compareKeys(a.date, b.date) || compareKeys(a.group ?? '', b.group ?? ''));
}

// ═══ SCALARS ═══

/** Distinct non-blank values of a field. */
export function uniqueCount(rows: Rows, field: DimensionField): number {
  const seen = new Set<string>();
  for (const r of rows) {
    const v = r[field];
    if (v) seen.add(v);
  }
  return seen.size;
}

export function summarize(rows: Rows): SummaryMetrics {
  return {
    totalArticles: rows.length,
    uniqueSources: uniqueCount(rows, 'source'),
    uniqueCountries: uniqueCount(rows, 'country'),
    uniqueLocations: uniqueCount(rows, 'locationUnit'),
  };
}

// ═══ MAP ═══

export function mapPoints(rows: Rows, max: number): MapPoint[] {
  const points: MapPoint[] = [];
  for (const r of rows) {
    if (points.length >= max) break;
    if (r.latitude === null || r.longitude === null) continue;
    points.push({
      id: r.id, lat: r.latitude, lon: r.longitude,
      title: r.title, category: r.category, locationUnit: r.locationUnit,
    });
  }
  return points;
}
