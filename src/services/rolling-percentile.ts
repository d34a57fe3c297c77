/**
 * Rolling Percentile Estimator
 *
 * Percentile of the trailing window ending at each position (inclusive),
 * over the non-missing values in that window only. Nothing after the
 * position is ever read.
 */

import { ConfigError } from "../lib/errors.ts";
import { isDefined, percentile, type Maybe } from "../lib/math-utils.ts";

/**
 * Non-missing observations a window needs before it yields a value.
 *
 * @example
 * minimumSamples(60) // 30
 * minimumSamples(1)  // 1
 */
export function minimumSamples(window: number): number {
  return Math.max(1, Math.floor(window / 2));
}

function assertWindow(window: number, p: number): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new ConfigError(`Window length must be a positive integer, got ${window}`, { window });
  }
  if (!Number.isFinite(p) || p < 0 || p > 100) {
    throw new ConfigError(`Percentile must be within [0, 100], got ${p}`, { percentile: p });
  }
}

/**
 * p-th percentile (0-100) of the trailing window ending at `index`, or null
 * when the window holds fewer than `minimumSamples(window)` values.
 */
export function percentileAt(
  series: readonly Maybe[],
  index: number,
  window: number,
  p: number,
): Maybe {
  assertWindow(window, p);
  if (index < 0 || index >= series.length) return null;

  const start = Math.max(0, index - window + 1);
  const present: number[] = [];
  for (let i = start; i <= index; i++) {
    const value = series[i];
    if (isDefined(value)) present.push(value);
  }

  if (present.length < minimumSamples(window)) return null;
  return percentile(present, p / 100);
}

/**
 * Parallel series of trailing-window percentiles.
 *
 * @example
 * rollingPercentile([1, 2, 3, 4], 4, 50) // [null, 1.5, 2, 2.5]
 */
export function rollingPercentile(series: readonly Maybe[], window: number, p: number): Maybe[] {
  assertWindow(window, p);
  return series.map((_, index) => percentileAt(series, index, window, p));
}
