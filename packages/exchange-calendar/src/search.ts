/**
 * Binary search over sorted arrays of dates or timestamps.
 */

/** First index whose value is `>= target` (length when none). */
export function lowerBound<T extends string | number>(values: readonly T[], target: T): number {
  let lo = 0;
  let hi = values.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const value = values[mid];
    if (value !== undefined && value < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/** First index whose value is `> target` (length when none). */
export function upperBound<T extends string | number>(values: readonly T[], target: T): number {
  let lo = 0;
  let hi = values.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const value = values[mid];
    if (value !== undefined && value <= target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
