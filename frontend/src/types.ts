// ═══════════════════════════════════════════════════════
// Dashboard client types — JSON shapes served by the API
// Dates arrive as YYYY-MM-DD strings.
// ═══════════════════════════════════════════════════════

export interface RankEntry {
  key: string;
  count: number;
}

export interface CrossTabEntry {
  keys: [string, string];
  count: number;
}

export interface TimeSeriesPoint {
  date: string;
  group?: string;
  count: number;
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
  date: string | null;
  titleLink: string;
  locationUnit: string;
  category: string;
  source: string;
}

export interface CriteriaSnapshot {
  categories: string[];
  locationUnits: string[];
  dateFrom: string | null;
  dateTo: string | null;
}

export interface DashboardBundle {
  datasetVersion: string;
  criteria: CriteriaSnapshot;
  summary: {
    totalArticles: number;
    uniqueSources: number;
    uniqueCountries: number;
    uniqueLocations: number;
  };
  categoryCounts: Record<string, number>;
  sentimentCounts: Record<string, number>;
  topCategories: RankEntry[];
  topLocations: RankEntry[];
  topLocationCategory: CrossTabEntry[];
  timeSeries: TimeSeriesPoint[];
  timeSeriesByCategory: TimeSeriesPoint[];
  mapPoints: MapPoint[];
  table: DisplayRow[];
}

export interface FilterOptions {
  profile: string;
  categoryLabel: string;
  locationLabel: string;
  categories: string[];
  locationUnits: string[];
  minDate: string | null;
  maxDate: string | null;
}

export interface SearchResults<T> {
  total: number;
  page: number;
  pages: number;
  limit: number;
  results: T[];
}

/** Widget state. Empty lists and empty dates mean "no restriction". */
export interface Filters {
  categories: string[];
  locationUnits: string[];
  dateFrom: string;
  dateTo: string;
}

export interface DashboardState {
  bundle: DashboardBundle | null;
  unfilteredBundle: DashboardBundle | null;
  filterOpts: FilterOptions | null;
  filters: Filters;
  hasActiveFilters: boolean;
  loading: boolean;
  filtering: boolean;
  error: string | null;
}
