import { DatasetStore } from '../services/dataset-store.ts';
import { getProfile } from '../config/profiles.ts';
import type { Article, PipelineOptions } from '../types.ts';

export const profile = getProfile('hazard-city');

export const OPTS: PipelineOptions = { topCategoriesN: 5, topLocationsN: 10, crossTabN: 10, mapPointsMax: 100 };

/** Day strings become UTC midnight; a full ISO timestamp is taken as-is. */
export function article(
  id: number,
  category: string,
  locationUnit: string,
  date: string | null,
  extra: Partial<Article> = {},
): Article {
  return {
    id,
    publishedAt: date === null ? null : new Date(date.length === 10 ? `${date}T00:00:00Z` : date),
    category,
    locationUnit,
    source: 'Ledger',
    title: `Title ${id}`,
    url: `https://example.com/${id}`,
    sentiment: 'unknown',
    latitude: null,
    longitude: null,
    country: 'Unknown',
    ...extra,
  };
}

/** The three-row dataset: flood/X, fire/Y, flood/X on consecutive days. */
export function scenarioStore(): DatasetStore {
  return new DatasetStore([
    article(0, 'flood', 'X', '2024-01-01'),
    article(1, 'fire', 'Y', '2024-01-02'),
    article(2, 'flood', 'X', '2024-01-03'),
  ], profile);
}

/**
 * Seven articles over three cities:
 *   0 flood  Riverton 01-03 10:00  Ledger negative  coords  A
 *   1 fire   Hillview 01-04        Post   neutral           A
 *   2 flood  Riverton 01-04        Wire   positive  coords  A
 *   3 storm  Lakeside 01-06        Ledger negative          B
 *   4 flood  Lakeside (no date)    Post   unknown           B
 *   5 fire   Hillview 01-04        Radio  positive  coords  Unknown
 *   6 storm  Riverton 01-07        Ledger negative          A
 */
export function newsRows(): Article[] {
  return [
    article(0, 'flood', 'Riverton', '2024-01-03T10:00:00Z', { source: 'Ledger', sentiment: 'negative', latitude: 40.1, longitude: -88.2, country: 'A' }),
    article(1, 'fire', 'Hillview', '2024-01-04', { source: 'Post', sentiment: 'neutral', country: 'A' }),
    article(2, 'flood', 'Riverton', '2024-01-04', { source: 'Wire', sentiment: 'positive', latitude: 40.12, longitude: -88.25, country: 'A' }),
    article(3, 'storm', 'Lakeside', '2024-01-06', { source: 'Ledger', sentiment: 'negative', country: 'B' }),
    article(4, 'flood', 'Lakeside', null, { source: 'Post', sentiment: 'unknown', country: 'B' }),
    article(5, 'fire', 'Hillview', '2024-01-04', { source: 'Radio', sentiment: 'positive', latitude: 40.5, longitude: -88.9 }),
    article(6, 'storm', 'Riverton', '2024-01-07', { source: 'Ledger', sentiment: 'negative', country: 'A' }),
  ];
}

export function newsStore(): DatasetStore {
  return new DatasetStore(newsRows(), profile);
}
