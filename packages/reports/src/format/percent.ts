/**
 * `part / whole` as a percentage rounded to one decimal place.
 * Returns 0 for a non-positive or non-finite whole; never divides by zero.
 */
export function percentOf(part: number, whole: number): number {
  if (!Number.isFinite(part) || !Number.isFinite(whole) || whole <= 0) return 0;
  return Math.round((part / whole) * 1000) / 10;
}

export function formatPercent(part: number, whole: number): string {
  return `${percentOf(part, whole).toFixed(1)}%`;
}
