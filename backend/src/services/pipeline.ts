/**
 * pipeline.ts — filter → aggregate → format, one pass
 *
 * The store is filtered exactly once per pass; every view reads
 * that same subset. Views are independent and pure, so they are
 * scheduled concurrently and the bundle is assembled only after
 * all of them have settled.
 */
import { setImmediate as nextTick } from 'timers/promises';
import { env } from '../config/env.ts';
import { applyFilter } from './filter-engine.ts';
import { snapshotCriteria } from './filter-builder.ts';
import {
  categoryCounts, countBy, crossTabTopN, mapPoints, summarize, timeSeries, topN,
} from './aggregator.ts';
import { formatTable } from './table-formatter.ts';
import type { DatasetStore } from './dataset-store.ts';
import type { DashboardBundle, FilterCriteria, FilteredSubset, PipelineOptions } from '../types.ts';

export function pipelineOptionsFromEnv(): PipelineOptions {
  return {
    topCategoriesN: env.TOP_CATEGORIES_N,
    topLocationsN: env.TOP_LOCATIONS_N,
    crossTabN: env.CROSSTAB_N,
    mapPointsMax: env.MAP_POINTS_MAX,
  };
}

/** Run fn on a later turn of the event loop. */
function view<T>(fn: () => T): Promise<T> {
  return nextTick().then(fn);
}

export async function buildBundle(subset: FilteredSubset, opts: PipelineOptions): Promise<DashboardBundle> {
  const rows = subset.rows;

  const [
    summary, cats, sentiments, topCategories, topLocations,
    topLocationCategory, series, seriesByCategory, points, table,
  ] = await Promise.all([
    view(() => summarize(rows)),
    view(() => categoryCounts(rows)),
    view(() => countBy(rows, 'sentiment')),
    view(() => topN(rows, 'category', opts.topCategoriesN)),
    view(() => topN(rows, 'locationUnit', opts.topLocationsN)),
    view(() => crossTabTopN(rows, ['locationUnit', 'category'], opts.crossTabN)),
    view(() => timeSeries(rows)),
    view(() => timeSeries(rows, 'category')),
    view(() => mapPoints(rows, opts.mapPointsMax)),
    view(() => formatTable(rows)),
  ]);

  return {
    datasetVersion: subset.datasetVersion,
    criteria: snapshotCriteria(subset.criteria),
    summary,
    categoryCounts: cats,
    sentimentCounts: sentiments,
    topCategories,
    topLocations,
    topLocationCategory,
    timeSeries: series,
    timeSeriesByCategory: seriesByCategory,
    mapPoints: points,
    table,
  };
}

export function runPipeline(store: DatasetStore, criteria: FilterCriteria, opts: PipelineOptions): Promise<DashboardBundle> {
  return buildBundle(applyFilter(store, criteria), opts);
}
