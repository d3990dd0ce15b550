/**
 * useDashboardStore.ts — Zustand store for the dashboard screen
 *
 * Holds the current selection, the bundle on screen, the unfiltered
 * bundle (restored on reset) and the widget options. Every filter
 * change cancels the request before it; a response that is not the
 * latest one is dropped, so the screen always shows the last input.
 * Framework-free (zustand/vanilla); views subscribe to the store.
 */
import { createStore } from 'zustand/vanilla';
import type { DashboardState, Filters } from '../types.ts';
import { fetchDashboard, fetchFilterOptions } from '../services/api.ts';

export const INIT_FILTERS: Filters = { categories: [], locationUnits: [], dateFrom: '', dateTo: '' };

interface DashboardActions {
  bootstrap: () => Promise<void>;
  updateFilter: <K extends keyof Filters>(key: K, value: Filters[K]) => Promise<void>;
  resetFilters: () => void;
}

export type DashboardStore = DashboardState & DashboardActions;

/** A date range only counts once both ends are set. */
export function isActive(f: Filters): boolean {
  return f.categories.length > 0 || f.locationUnits.length > 0 || (f.dateFrom !== '' && f.dateTo !== '');
}

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createDashboardStore() {
  let latest = 0;
  let inflight: AbortController | null = null;

  function supersede(): number {
    inflight?.abort();
    inflight = null;
    return ++latest;
  }

  return createStore<DashboardStore>()((set, get) => ({
    bundle: null,
    unfilteredBundle: null,
    filterOpts: null,
    filters: { ...INIT_FILTERS },
    hasActiveFilters: false,
    loading: false,
    filtering: false,
    error: null,

    // ═══ ACTIONS ═══

    bootstrap: async () => {
      set({ loading: true, error: null });
      try {
        const [bundle, filterOpts] = await Promise.all([fetchDashboard(), fetchFilterOptions()]);
        set({ bundle, unfilteredBundle: bundle, filterOpts, loading: false });
      } catch (err) {
        set({ error: message(err), loading: false });
      }
    },

    updateFilter: async (key, value) => {
      const next: Filters = { ...get().filters };
      next[key] = value;
      const active = isActive(next);
      const seq = supersede();
      set({ filters: next, hasActiveFilters: active, error: null });

      if (!active) {
        set({ bundle: get().unfilteredBundle, filtering: false });
        return;
      }

      const controller = new AbortController();
      inflight = controller;
      set({ filtering: true });
      try {
        const bundle = await fetchDashboard(next, controller.signal);
        if (seq !== latest) return;
        set({ bundle, filtering: false });
      } catch (err) {
        // a newer change already owns the screen
        if (seq !== latest) return;
        // rejected selection: keep the bundle that is showing
        set({ error: message(err), filtering: false });
      } finally {
        if (inflight === controller) inflight = null;
      }
    },

    resetFilters: () => {
      supersede();
      set({
        filters: { ...INIT_FILTERS },
        hasActiveFilters: false,
        bundle: get().unfilteredBundle,
        filtering: false,
        error: null,
      });
    },
  }));
}

export const dashboardStore = createDashboardStore();
