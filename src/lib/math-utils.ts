/**
 * @fileoverview Math utilities and array helpers for the regime backtest engine.
 * Provides statistical calculations over sparse (nullable) numeric series.
 */

// ============================================================================
// TYPES
// ============================================================================

/**
 * A numeric observation that may be missing. Missing values are excluded from
 * every statistic below, never treated as zero.
 */
export type Maybe = number | null;

// ============================================================================
// STATISTICAL FUNCTIONS
// ============================================================================

/**
 * Calculates the mean (average) of an array of numbers.
 * Returns 0 for empty arrays.
 *
 * @example
 * mean([1, 2, 3, 4, 5]) // returns 3
 * mean([]) // returns 0
 */
export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, val) => sum + val, 0) / values.length;
}

/**
 * Calculates the nth percentile of an array of numbers.
 * Uses linear interpolation between closest ranks.
 *
 * @param values - Array of numbers (will be sorted)
 * @param p - Percentile to calculate (0-1, where 0.5 = median)
 * @returns The percentile value, or 0 if empty array
 *
 * @example
 * percentile([1, 2, 3, 4, 5], 0.5) // returns 3 (median)
 * percentile([1, 2, 3, 4, 5], 0.95) // returns 4.8 (95th percentile)
 */
export function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = p * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const weight = index % 1;
  if (lower === upper) return sorted[lower];
  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

// ============================================================================
// SPARSE SERIES HELPERS
// ============================================================================

/**
 * True when the value is present and a finite number.
 */
export function isDefined(value: Maybe | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * Drops missing entries from a sparse series.
 *
 * @example
 * definedValues([1, null, 3]) // returns [1, 3]
 */
export function definedValues(values: readonly (Maybe | undefined)[]): number[] {
  const result: number[] = [];
  for (const v of values) {
    if (isDefined(v)) result.push(v);
  }
  return result;
}

/**
 * Mean of the defined entries, or null when none are defined.
 *
 * @example
 * meanOfDefined([0.02, null, 0.04]) // returns 0.03
 * meanOfDefined([null, null]) // returns null
 */
export function meanOfDefined(values: readonly Maybe[]): Maybe {
  const present = definedValues(values);
  return present.length === 0 ? null : mean(present);
}

/**
 * Minimum of the defined entries, or null when none are defined.
 */
export function minOfDefined(values: readonly Maybe[]): Maybe {
  const present = definedValues(values);
  return present.length === 0 ? null : Math.min(...present);
}

// ============================================================================
// ROUNDING
// ============================================================================

/**
 * Rounds a number to the given number of decimal places.
 *
 * @example
 * round(3.14159, 2) // returns 3.14
 */
export function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Rounds to 4 decimal places.
 */
export function round4(value: number): number {
  return round(value, 4);
}

// ============================================================================
// ARRAY HELPERS
// ============================================================================

/**
 * Groups items by the key returned from the selector, preserving input order
 * within each group. Items for which the selector returns null are skipped.
 *
 * @example
 * groupBy([{r: "a"}, {r: "b"}, {r: "a"}], (x) => x.r) // Map { a => [..2], b => [..1] }
 */
export function groupBy<T, K>(
  items: readonly T[],
  selector: (item: T) => K | null,
): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = selector(item);
    if (key === null) continue;
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}
