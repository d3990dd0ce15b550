import { describe, it, expect } from 'vitest';
import { applyFilter } from '../services/filter-engine.ts';
import { buildCriteria } from '../services/filter-builder.ts';
import { DatasetStore } from '../services/dataset-store.ts';
import { DatasetContractError } from '../shared/errors.ts';
import { article, newsStore, profile, scenarioStore } from './fixtures.ts';
import type { Article, RawSelection } from '../types.ts';

const ids = (rows: readonly Article[]) => rows.map(r => r.id);

/** Independent statement of the retention rule. */
function expected(row: Article, s: { categories?: string[]; locationUnits?: string[]; dateFrom?: string; dateTo?: string }): boolean {
  const catOk = !s.categories?.length || s.categories.includes(row.category);
  const locOk = !s.locationUnits?.length || s.locationUnits.includes(row.locationUnit);
  let dateOk = true;
  if (s.dateFrom && s.dateTo) {
    const day = row.publishedAt?.toISOString().slice(0, 10);
    dateOk = day !== undefined && day >= s.dateFrom && day <= s.dateTo;
  }
  return catOk && locOk && dateOk;
}

describe('applyFilter', () => {
  it('returns the whole store, in order, for unrestricted criteria', () => {
    const store = newsStore();
    const subset = applyFilter(store, buildCriteria({}));
    expect(subset.rows).toEqual(store.rows);
    expect(subset.datasetVersion).toBe(store.version);
  });

  it('hands out references into the store rather than copies', () => {
    const store = newsStore();
    const subset = applyFilter(store, buildCriteria({ categories: ['fire'] }));
    expect(subset.rows[0]).toBe(store.rows[1]);
    expect(subset.rows[1]).toBe(store.rows[5]);
  });

  it('keeps the flood rows of the three-row dataset', () => {
    expect(ids(applyFilter(scenarioStore(), buildCriteria({ categories: ['flood'] })).rows)).toEqual([0, 2]);
  });

  it('treats a single-day range as inclusive on both ends', () => {
    const subset = applyFilter(scenarioStore(), buildCriteria({ dateFrom: '2024-01-02', dateTo: '2024-01-02' }));
    expect(ids(subset.rows)).toEqual([1]);
  });

  it('ignores a lone dateFrom', () => {
    expect(ids(applyFilter(scenarioStore(), buildCriteria({ dateFrom: '2024-01-02' })).rows)).toEqual([0, 1, 2]);
  });

  it('ORs within a dimension and ANDs across dimensions', () => {
    const subset = applyFilter(newsStore(), buildCriteria({ categories: ['flood', 'storm'], locationUnits: ['Riverton'] }));
    expect(ids(subset.rows)).toEqual([0, 2, 6]);
  });

  it('drops undated rows only while a date range is active', () => {
    const store = newsStore();
    expect(ids(applyFilter(store, buildCriteria({ categories: ['flood'] })).rows)).toEqual([0, 2, 4]);
    expect(ids(applyFilter(store, buildCriteria({ categories: ['flood'], dateFrom: '2024-01-01', dateTo: '2024-12-31' })).rows))
      .toEqual([0, 2]);
  });

  it('compares on the calendar day, so a late timestamp on dateTo is kept', () => {
    const store = new DatasetStore([article(0, 'flood', 'X', '2024-01-03T23:59:00Z')], profile);
    expect(applyFilter(store, buildCriteria({ dateFrom: '2024-01-01', dateTo: '2024-01-03' })).rows).toHaveLength(1);
  });

  it('returns an empty subset when nothing matches', () => {
    expect(applyFilter(newsStore(), buildCriteria({ categories: ['drought'] })).rows).toEqual([]);
  });

  it('retains exactly the rows satisfying every clause', () => {
    const store = newsStore();
    const selections = [
      { categories: ['fire'] },
      { locationUnits: ['Lakeside', 'Hillview'] },
      { dateFrom: '2024-01-04', dateTo: '2024-01-06' },
      { categories: ['flood'], dateFrom: '2024-01-04', dateTo: '2024-01-07' },
      { categories: ['storm', 'fire'], locationUnits: ['Riverton'], dateFrom: '2024-01-01', dateTo: '2024-01-31' },
    ];
    for (const s of selections) {
      const raw: RawSelection = s;
      const kept = new Set(applyFilter(store, buildCriteria(raw)).rows);
      for (const row of store.rows) {
        expect(kept.has(row)).toBe(expected(row, s));
      }
    }
  });
});

describe('DatasetStore', () => {
  it('refuses rows that break the ingestion contract', () => {
    expect(() => new DatasetStore([article(7, '', 'X', null)], profile)).toThrow(DatasetContractError);
    expect(() => new DatasetStore([article(8, 'flood', '', null)], profile)).toThrow('Row 8 has no locationUnit');
  });

  it('is frozen after construction', () => {
    const store = newsStore();
    expect(Object.isFrozen(store.rows)).toBe(true);
    expect(Object.isFrozen(store.rows[0])).toBe(true);
  });

  it('derives the same version from the same rows', () => {
    expect(newsStore().version).toBe(newsStore().version);
    expect(newsStore().version).not.toBe(scenarioStore().version);
  });

  it('lists filter options sorted, with the day bounds of dated rows', () => {
    expect(newsStore().filterOptions()).toEqual({
      profile: 'hazard-city',
      categoryLabel: 'Hazard',
      locationLabel: 'City',
      categories: ['fire', 'flood', 'storm'],
      locationUnits: ['Hillview', 'Lakeside', 'Riverton'],
      minDate: '2024-01-03',
      maxDate: '2024-01-07',
    });
  });
});
