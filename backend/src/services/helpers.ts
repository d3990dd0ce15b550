// ═══════════════════════════════════════════════════════
// helpers.ts — Pure utility functions
// ═══════════════════════════════════════════════════════
import type { PageResult } from '../types.ts';

const DAY_KEY = /^(\d{4})-(\d{2})-(\d{2})$/;

/** UTC calendar day of a timestamp → "YYYY-MM-DD" */
export function dayKey(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** True when s is a real calendar day in YYYY-MM-DD form ("2024-02-30" is not). */
export function isDayKey(s: string): boolean {
  const m = DAY_KEY.exec(s);
  if (!m) return false;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const date = new Date(Date.UTC(y, mo - 1, d));
  return date.getUTCFullYear() === y && date.getUTCMonth() === mo - 1 && date.getUTCDate() === d;
}

/** Trimmed, de-duplicated, non-blank values in first-seen order. */
export function cleanList(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const v of values) {
    const t = v.trim();
    if (t) seen.add(t);
  }
  return [...seen];
}

/** A single or repeated query value → list. Each value is taken whole; a comma is part of the value. */
export function asList(v: string | readonly string[] | undefined): string[] {
  if (v === undefined) return [];
  return cleanList(typeof v === 'string' ? [v] : v);
}

/** Freeze an object and every object or array reachable from it. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

/** Code-unit ordering, independent of locale. */
export function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Slice one page out of an ordered sequence. */
export function paginate<T>(items: readonly T[], page: number, limit: number): PageResult<T> {
  const total = items.length;
  const pages = Math.ceil(total / limit);
  const start = (page - 1) * limit;
  return { total, page, pages, limit, results: items.slice(start, start + limit) };
}
