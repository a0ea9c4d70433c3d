import type { Route } from './types.js';

// =============================================================================
// Small numeric / calendar helpers shared by the aggregator and analyzers.
// All calendar math is UTC so a departure lands on the same day everywhere.
// =============================================================================

const DAY_MS = 86400000;

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Smallest and largest value; both 0 for an empty list. */
export function minMax(values: number[]): { min: number; max: number } {
  if (values.length === 0) return { min: 0, max: 0 };
  let min = values[0];
  let max = values[0];
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, max };
}

export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/** Parse an ISO timestamp; null when missing or unparseable. */
export function parseTimestamp(value: string | null): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Format a Date as YYYY-MM-DD (UTC) */
export function toDateStr(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Shift a YYYY-MM-DD string by whole days */
export function addDays(dateStr: string, days: number): string {
  const base = new Date(`${dateStr}T00:00:00Z`);
  return toDateStr(new Date(base.getTime() + days * DAY_MS));
}

export function daysAgo(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

export function isWeekend(date: Date): boolean {
  const day = date.getUTCDay();
  return day === 0 || day === 6;
}

export function formatPrice(value: number): string {
  return `$${value.toFixed(2)}`;
}

export function routeName(route: Pick<Route, 'origin' | 'destination' | 'airline'>): string {
  return `${route.origin}-${route.destination} (${route.airline})`;
}
