// ═══════════════════════════════════════════════════════
// filter-engine.ts — One linear pass over the store
// AND across dimensions, membership within a dimension.
// The subset holds references into the store, not copies.
// ═══════════════════════════════════════════════════════
import { dayKey } from './helpers.ts';
import type { DatasetStore } from './dataset-store.ts';
import type { Article, FilterCriteria, FilteredSubset } from '../types.ts';

export function matches(row: Article, c: FilterCriteria): boolean {
  if (c.categories.size > 0 && !c.categories.has(row.category)) return false;
  if (c.locationUnits.size > 0 && !c.locationUnits.has(row.locationUnit)) return false;
  if (c.dateRange) {
    if (!row.publishedAt) return false;
    const d = dayKey(row.publishedAt);
    if (d < c.dateRange.from || d > c.dateRange.to) return false;
  }
  return true;
}

export function applyFilter(store: DatasetStore, criteria: FilterCriteria): FilteredSubset {
  const rows: Article[] = [];
  for (const row of store.rows) {
    if (matches(row, criteria)) rows.push(row);
  }
  return { datasetVersion: store.version, criteria, rows };
}
