// ═══════════════════════════════════════════════════════
// profiles.ts — Column mappings for the supported datasets
// One pipeline serves all of them; only the source column
// names and labels differ.
// ═══════════════════════════════════════════════════════

export type ProfileId = 'global-news' | 'hazard-city' | 'hazard-county';

export interface ColumnMap {
  publishedDate: string;
  publishedTime?: string;
  category: string;
  locationUnit: string;
  source: string;
  title: string;
  url: string;
  sentiment: string;
  latitude: string;
  longitude: string;
  country: string;
}

export interface DatasetProfile {
  id: ProfileId;
  categoryLabel: string;
  locationLabel: string;
  columns: ColumnMap;
  /** Fills a blank location before rows without one are dropped */
  locationDefault?: string;
  /**
   * date-fns patterns tried in order; ISO first so day-first never misreads it.
   * A pattern with an offset (X) gives an instant; the rest are wall-clock UTC.
   */
  dateFormats: string[];
}

const DAY_FIRST_FORMATS = [
  'yyyy-MM-dd',
  'yyyy-MM-dd HH:mm:ss',
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm:ss.SSS",
  "yyyy-MM-dd'T'HH:mm:ssXXX",
  "yyyy-MM-dd'T'HH:mm:ss.SSSXXX",
  'dd/MM/yyyy',
  'dd/MM/yyyy HH:mm',
  'dd-MM-yyyy',
  'dd.MM.yyyy',
];

const HAZARD_COLUMNS = {
  publishedDate: 'date',
  category: 'hazard_type',
  source: 'media',
  title: 'title',
  url: 'url',
  sentiment: 'sentiment',
  latitude: 'latitude',
  longitude: 'longitude',
  country: 'country',
} as const;

export const PROFILES: Record<ProfileId, DatasetProfile> = {
  'global-news': {
    id: 'global-news',
    categoryLabel: 'Keyword',
    locationLabel: 'Country',
    // the location is the country column, which defaults like country does
    locationDefault: 'Unknown',
    columns: {
      publishedDate: 'published_date',
      publishedTime: 'published_time',
      category: 'keyword',
      locationUnit: 'country',
      source: 'source',
      title: 'title',
      url: 'url',
      sentiment: 'sentiment',
      latitude: 'latitude',
      longitude: 'longitude',
      country: 'country',
    },
    dateFormats: DAY_FIRST_FORMATS,
  },
  'hazard-city': {
    id: 'hazard-city',
    categoryLabel: 'Hazard',
    locationLabel: 'City',
    columns: { ...HAZARD_COLUMNS, locationUnit: 'city' },
    dateFormats: DAY_FIRST_FORMATS,
  },
  'hazard-county': {
    id: 'hazard-county',
    categoryLabel: 'Hazard',
    locationLabel: 'County',
    columns: { ...HAZARD_COLUMNS, locationUnit: 'county' },
    dateFormats: DAY_FIRST_FORMATS,
  },
};

export function getProfile(id: ProfileId): DatasetProfile {
  return PROFILES[id];
}
