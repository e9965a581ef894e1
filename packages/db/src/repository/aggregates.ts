/**
 * In-memory reductions over records returned by `listByTenant`.
 *
 * Money is accumulated in minor units and converted back once, so summing many
 * two-decimal amounts never drifts.
 */

export function toMinorUnits(value: number): number {
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid currency amount: ${value}`);
  }
  return Math.round(value * 100);
}

export function fromMinorUnits(minor: number): number {
  return minor / 100;
}

export function roundCurrency(value: number): number {
  return fromMinorUnits(toMinorUnits(value));
}

export function sumBy<T>(items: readonly T[], select: (item: T) => number | null | undefined): number {
  let totalMinor = 0;
  for (const item of items) {
    const value = select(item);
    if (value !== null && value !== undefined) {
      totalMinor += toMinorUnits(value);
    }
  }
  return fromMinorUnits(totalMinor);
}

export function countBy<T>(items: readonly T[], key: (item: T) => string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const bucket = key(item);
    counts.set(bucket, (counts.get(bucket) ?? 0) + 1);
  }
  return counts;
}

/** Sums per bucket, buckets in first-seen order. */
export function groupSum<T>(
  items: readonly T[],
  key: (item: T) => string,
  select: (item: T) => number | null | undefined
): Map<string, number> {
  const minorTotals = new Map<string, number>();
  for (const item of items) {
    const bucket = key(item);
    const value = select(item);
    const current = minorTotals.get(bucket) ?? 0;
    minorTotals.set(
      bucket,
      value === null || value === undefined ? current : current + toMinorUnits(value)
    );
  }
  const totals = new Map<string, number>();
  for (const [bucket, minor] of minorTotals) {
    totals.set(bucket, fromMinorUnits(minor));
  }
  return totals;
}

/** Mean of the non-null values, or null when there are none. */
export function averageBy<T>(
  items: readonly T[],
  select: (item: T) => number | null | undefined
): number | null {
  let total = 0;
  let count = 0;
  for (const item of items) {
    const value = select(item);
    if (value !== null && value !== undefined) {
      total += value;
      count += 1;
    }
  }
  return count === 0 ? null : total / count;
}

/** `YYYY-MM` of an ISO date or timestamp. */
export function monthKey(isoDate: string): string {
  return isoDate.slice(0, 7);
}

/** `YYYY-MM-DD` of an ISO date or timestamp. */
export function dayKey(isoDate: string): string {
  return isoDate.slice(0, 10);
}
