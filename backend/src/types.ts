// ═══════════════════════════════════════════════════════
// News Dashboard — Core Type Definitions
// Every data shape flowing through ingestion, the filter
// pipeline and the HTTP layer.
// ═══════════════════════════════════════════════════════

// ── Dataset rows ──

export interface Article {
  id: number;                 // row position in the loaded file
  publishedAt: Date | null;   // UTC timestamp, null when the source date was unparseable
  category: string;           // hazard type / keyword, never blank
  locationUnit: string;       // city, county or country depending on profile, never blank
  source: string;             // media outlet
  title: string;
  url: string;
  sentiment: string;          // "unknown" when missing
  latitude: number | null;
  longitude: number | null;
  country: string;            // "Unknown" when missing
}

/** Article fields holding a string dimension that views can group by. */
export type DimensionField = 'category' | 'locationUnit' | 'source' | 'sentiment' | 'country';

// ── Filtering ──

/** Inclusive day range, both bounds as YYYY-MM-DD. */
export interface DateRange {
  from: string;
  to: string;
}

export interface FilterCriteria {
  categories: ReadonlySet<string>;     // empty = unrestricted
  locationUnits: ReadonlySet<string>;  // empty = unrestricted
  dateRange: DateRange | null;         // null = unrestricted
}

/** Raw widget values as the presentation layer sends them. */
export interface RawSelection {
  categories?: string | readonly string[] | null;
  locationUnits?: string | readonly string[] | null;
  dateFrom?: string | null;
  dateTo?: string | null;
}

/** JSON-friendly form of FilterCriteria, sorted for stable keys. */
export interface CriteriaSnapshot {
  categories: string[];
  locationUnits: string[];
  dateFrom: string | null;
  dateTo: string | null;
}

export interface FilteredSubset {
  datasetVersion: string;
  criteria: FilterCriteria;
  rows: readonly Article[];
}

// ── Aggregate results ──

export type CategoryCounts = Record<string, number>;

export interface RankEntry {
  key: string;
  count: number;
}

export interface CrossTabEntry {
  keys: [string, string];
  count: number;
}

export interface TimeSeriesPoint {
  date: string;       // YYYY-MM-DD
  group?: string;
  count: number;
}

export interface SummaryMetrics {
  totalArticles: number;
  uniqueSources: number;
  uniqueCountries: number;
  uniqueLocations: number;
}

export interface MapPoint {
  id: number;
  lat: number;
  lon: number;
  title: string;
  category: string;
  locationUnit: string;
}

export interface DisplayRow {
  date: string | null;  // YYYY-MM-DD
  titleLink: string;
  locationUnit: string;
  category: string;
  source: string;
}

/** Everything one pipeline pass publishes. */
export interface DashboardBundle {
  datasetVersion: string;
  criteria: CriteriaSnapshot;
  summary: SummaryMetrics;
  categoryCounts: CategoryCounts;
  sentimentCounts: CategoryCounts;
  topCategories: RankEntry[];
  topLocations: RankEntry[];
  topLocationCategory: CrossTabEntry[];
  timeSeries: TimeSeriesPoint[];
  timeSeriesByCategory: TimeSeriesPoint[];
  mapPoints: MapPoint[];
  table: DisplayRow[];
}

export interface PipelineOptions {
  topCategoriesN: number;
  topLocationsN: number;
  crossTabN: number;
  mapPointsMax: number;
}

// ── Filter options ──

export interface FilterOptions {
  profile: string;
  categoryLabel: string;
  locationLabel: string;
  categories: string[];
  locationUnits: string[];
  minDate: string | null;
  maxDate: string | null;
}

// ── Ingestion ──

export interface IngestionReport {
  totalRows: number;
  keptRows: number;
  undatedRows: number;
  excluded: {
    missingCategory: number;
    missingLocation: number;
  };
  parseErrors: number;
}

// ── Pagination ──

export interface PageResult<T> {
  total: number;
  page: number;
  pages: number;
  limit: number;
  results: T[];
}
