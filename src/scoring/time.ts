/**
 * RepoPulse — Day arithmetic for scoring.
 */

export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parse an ISO timestamp; null when missing or unparseable.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Whole days elapsed from `value` to `now` (floored). Null when unknown.
 */
export function daysSince(value: string | null | undefined, now: Date): number | null {
  const date = parseTimestamp(value);
  if (!date) return null;
  return Math.floor((now.getTime() - date.getTime()) / DAY_MS);
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
