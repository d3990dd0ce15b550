/**
 * theme.ts — Design tokens for the dashboard views
 *
 * Charts pick category colours from one palette so the same category
 * has the same colour on the bar chart, the time series and the map.
 */

// ── Color Palette ──
export const colors = {
  // Brand
  accent: '#2563eb',
  accentLight: '#eff6ff',

  // Neutrals
  text: '#1b2d4b',
  textSub: '#475569',
  textMute: '#94a3b8',

  // Backgrounds
  bg: '#f8f9fb',
  card: '#ffffff',
  border: '#e5e5ee',

  // Semantic
  sky: '#0ea5e9',
  indigo: '#6366f1',
  violet: '#7c3aed',
  rose: '#e11d48',
  emerald: '#10b981',
  amber: '#d97706',
  pink: '#ec4899',
  teal: '#14b8a6',
  red: '#dc2626',
  blue: '#3b82f6',
  green: '#059669',
} as const;

// ── Typography ──
export const fonts = {
  sans: '-apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif',
  mono: '"SF Mono", "Cascadia Code", "Fira Code", monospace',
} as const;

// ── Chart palette ──
export const chartColors = [
  colors.sky, colors.indigo, colors.violet, colors.rose,
  colors.emerald, colors.amber, colors.pink, colors.teal,
  colors.red, colors.blue,
] as const;

export const sentimentColors: Record<string, string> = {
  positive: colors.green,
  neutral: colors.textMute,
  negative: colors.red,
};

// ── Utility functions ──

function hashIndex(s: string, mod: number): number {
  let h = 0;
  for (let i = 0; i < s.length; i++) h = (h * 31 + s.charCodeAt(i)) >>> 0;
  return h % mod;
}

/**
 * Colour for a category. With the full option list the colour follows
 * the category's position in it; without one it is derived from the name.
 */
export function categoryColor(category: string, known: readonly string[] = []): string {
  const idx = known.indexOf(category);
  const i = idx >= 0 ? idx % chartColors.length : hashIndex(category, chartColors.length);
  return chartColors[i] ?? colors.accent;
}

export const sentimentColor = (s: string): string => sentimentColors[s.toLowerCase()] ?? colors.amber;

/** Bar width as a percentage of the largest count. */
export const barPct = (count: number, max: number): number =>
  max > 0 ? Math.round((count / max) * 100) : 0;
