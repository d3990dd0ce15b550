// ═══════════════════════════════════════════════════════
// table-formatter.ts — Detail table rows
// Newest first, undated rows last, ties keep subset order.
// Pagination is left to the caller (see helpers.paginate).
// ═══════════════════════════════════════════════════════
import { dayKey } from './helpers.ts';
import type { Article, DisplayRow } from '../types.ts';

/** "[title](url)"; a row without a url keeps its bare title. */
export function titleLink(title: string, url: string): string {
  return url ? `[${title}](${url})` : title;
}

function byDateDesc(a: Article, b: Article): number {
  if (a.publishedAt && b.publishedAt) return b.publishedAt.getTime() - a.publishedAt.getTime();
  if (a.publishedAt) return -1;
  if (b.publishedAt) return 1;
  return 0;
}

export function formatTable(rows: readonly Article[]): DisplayRow[] {
  return [...rows].sort(byDateDesc).map(r => ({
    date: r.publishedAt ? dayKey(r.publishedAt) : null,
    titleLink: titleLink(r.title, r.url),
    locationUnit: r.locationUnit,
    category: r.category,
    source: r.source,
  }));
}
