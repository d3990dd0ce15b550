// ═══════════════════════════════════════════════════════
// dataset-store.ts — The loaded article set
// Built once at startup, frozen, shared read-only by every
// pass. The version is a content hash so cached bundles
// from another file never collide.
// ═══════════════════════════════════════════════════════
import { createHash } from 'crypto';
import { DatasetContractError } from '../shared/errors.ts';
import { compareKeys, dayKey } from './helpers.ts';
import type { Article, FilterOptions } from '../types.ts';
import type { DatasetProfile } from '../config/profiles.ts';

export class DatasetStore {
  readonly rows: readonly Article[];
  readonly version: string;
  readonly profile: DatasetProfile;
  private options: FilterOptions | null = null;

  constructor(rows: readonly Article[], profile: DatasetProfile) {
    for (const row of rows) {
      if (!row.category) throw new DatasetContractError(row.id, 'category');
      if (!row.locationUnit) throw new DatasetContractError(row.id, 'locationUnit');
    }
    this.rows = Object.freeze(rows.map(r => Object.freeze({ ...r })));
    this.profile = profile;
    this.version = createHash('md5')
      .update(profile.id)
      .update(JSON.stringify(this.rows))
      .digest('hex')
      .slice(0, 12);
  }

  get size(): number {
    return this.rows.length;
  }

  /** Values for the selection widgets: distinct categories and locations, day bounds. */
  filterOptions(): FilterOptions {
    if (this.options) return this.options;

    const categories = new Set<string>();
    const locations = new Set<string>();
    let minDate: string | null = null;
    let maxDate: string | null = null;

    for (const r of this.rows) {
      categories.add(r.category);
      locations.add(r.locationUnit);
      if (!r.publishedAt) continue;
      const d = dayKey(r.publishedAt);
      if (minDate === null || d < minDate) minDate = d;
      if (maxDate === null || d > maxDate) maxDate = d;
    }

    this.options = {
      profile: this.profile.id,
      categoryLabel: this.profile.categoryLabel,
      locationLabel: this.profile.locationLabel,
      categories: [...categories].sort(compareKeys),
      locationUnits: [...locations].sort(compareKeys),
      minDate,
      maxDate,
    };
    return this.options;
  }
}
