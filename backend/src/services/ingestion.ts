/**
 * services/ingestion.ts — CSV → cleaned Article rows
 *
 * Runs once at startup, before anything else touches the data:
 *   - headers trimmed, empty lines skipped
 *   - dates parsed with the profile's formats (day-first after ISO),
 *     optional time column merged in, stored as UTC
 *   - latitude/longitude coerced to numbers, junk → null
 *   - sentiment defaults to "unknown", country to "Unknown"
 *   - rows without a category or location are dropped and counted,
 *     after the profile's location default is applied
 *
 * An unparseable date is not a reason to drop a row: the article
 * still counts everywhere a date filter is not active.
 */
import { readFile } from 'fs/promises';
import Papa from 'papaparse';
import { isValid, parse } from 'date-fns';
import { DatasetStore } from './dataset-store.ts';
import { childLogger } from '../shared/logger.ts';
import { datasetRows } from '../shared/metrics.ts';
import type { DatasetProfile } from '../config/profiles.ts';
import type { Article, IngestionReport } from '../types.ts';

const log = childLogger({ module: 'ingestion' });

// Fixed reference so parsing never depends on the current clock.
const REFERENCE_DATE = new Date(2000, 0, 1);

type RawRow = Record<string, string | undefined>;

function text(row: RawRow, column: string | undefined): string {
  return column ? (row[column] ?? '').trim() : '';
}

function toNumber(v: string): number | null {
  if (!v) return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

interface Parsed {
  date: Date;
  zoned: boolean;   // the text carried its own offset
}

function parseWithFormats(v: string, formats: readonly string[]): Parsed | null {
  for (const f of formats) {
    const date = parse(v, f, REFERENCE_DATE);
    if (isValid(date)) return { date, zoned: f.includes('X') };
  }
  return null;
}

/**
 * Local wall-clock fields from date-fns → the same fields in UTC.
 * A timestamp with an offset is already an instant and is kept as-is.
 */
export function parsePublishedAt(date: string, time: string, formats: readonly string[]): Date | null {
  if (!date) return null;
  const parsed = parseWithFormats(date, formats);
  if (!parsed) return null;
  if (parsed.zoned) return parsed.date;
  const d = parsed.date;
  const t = time ? parseWithFormats(time, ['HH:mm:ss', 'HH:mm']) : null;
  const clock = t?.date ?? d;
  return new Date(Date.UTC(
    d.getFullYear(), d.getMonth(), d.getDate(),
    clock.getHours(), clock.getMinutes(), clock.getSeconds(), clock.getMilliseconds(),
  ));
}

export function parseArticlesCsv(csv: string, profile: DatasetProfile): { rows: Article[]; report: IngestionReport } {
  const parsed = Papa.parse<RawRow>(csv, {
    header: true,
    skipEmptyLines: true,
    transformHeader: h => h.trim(),
  });

  for (const e of parsed.errors.slice(0, 20)) {
    log.warn({ row: e.row, code: e.code }, `CSV parse issue: ${e.message}`);
  }

  const cols = profile.columns;
  const report: IngestionReport = {
    totalRows: parsed.data.length,
    keptRows: 0,
    undatedRows: 0,
    excluded: { missingCategory: 0, missingLocation: 0 },
    parseErrors: parsed.errors.length,
  };
  const rows: Article[] = [];

  parsed.data.forEach((raw, id) => {
    const category = text(raw, cols.category);
    const locationUnit = text(raw, cols.locationUnit) || profile.locationDefault || '';
    if (!category) { report.excluded.missingCategory++; return; }
    if (!locationUnit) { report.excluded.missingLocation++; return; }

    const publishedAt = parsePublishedAt(text(raw, cols.publishedDate), text(raw, cols.publishedTime), profile.dateFormats);
    if (!publishedAt) report.undatedRows++;

    rows.push({
      id,
      publishedAt,
      category,
      locationUnit,
      source: text(raw, cols.source),
      title: text(raw, cols.title),
      url: text(raw, cols.url),
      sentiment: text(raw, cols.sentiment) || 'unknown',
      latitude: toNumber(text(raw, cols.latitude)),
      longitude: toNumber(text(raw, cols.longitude)),
      country: text(raw, cols.country) || 'Unknown',
    });
  });

  report.keptRows = rows.length;
  return { rows, report };
}

export async function loadDataset(
  file: string,
  profile: DatasetProfile,
  encoding: BufferEncoding = 'latin1',
): Promise<{ store: DatasetStore; report: IngestionReport }> {
  const t0 = Date.now();
  const csv = await readFile(file, { encoding });
  const { rows, report } = parseArticlesCsv(csv, profile);
  const store = new DatasetStore(rows, profile);

  datasetRows.set({ profile: profile.id }, store.size);
  log.info({ file, profile: profile.id, version: store.version, ms: Date.now() - t0, ...report }, 'Dataset loaded');
  return { store, report };
}
