/**
 * Return & Drawdown Calculator
 *
 * Per-instrument period returns, cumulative growth, running peak and
 * peak-relative drawdown. Each instrument column is computed on its own;
 * a missing level yields missing derived values at that row, never zero.
 */

import { isDefined, minOfDefined, type Maybe } from "../lib/math-utils.ts";
import type { InstrumentTable } from "./regime-types.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PerformanceSeries {
  returns: Maybe[];
  growth: Maybe[];
  peak: Maybe[];
  /** Always ≤ 0; 0 wherever growth sets a new running maximum */
  drawdown: Maybe[];
}

export interface PerformanceTable {
  dates: string[];
  series: Record<string, PerformanceSeries>;
}

// ---------------------------------------------------------------------------
// Single series
// ---------------------------------------------------------------------------

/**
 * return(t) = level(t) / level(s) - 1, where s is the latest earlier row
 * with a level. Missing at rows without a level, before the first level,
 * and after a zero level.
 *
 * @example
 * periodReturns([100, 110, null, 99]) // [null, 0.1, null, -0.1]
 */
export function periodReturns(levels: readonly Maybe[]): Maybe[] {
  let previous: Maybe = null;
  return levels.map((level) => {
    if (!isDefined(level)) return null;
    const base = previous;
    previous = level;
    if (!isDefined(base) || base === 0) return null;
    const r = level / base - 1;
    return Number.isFinite(r) ? r : null;
  });
}

/**
 * Growth, running peak and drawdown from a return series. Growth compounds
 * over defined returns only; the peak carries across gaps. Fed from
 * `periodReturns`, growth(t) is level(t) over the first level.
 */
export function growthAndDrawdown(returns: readonly Maybe[]): Omit<PerformanceSeries, "returns"> {
  const growth: Maybe[] = [];
  const peak: Maybe[] = [];
  const drawdown: Maybe[] = [];

  let compounded: number | null = null;
  let runningPeak: number | null = null;

  for (const r of returns) {
    if (!isDefined(r)) {
      growth.push(null);
      peak.push(runningPeak);
      drawdown.push(null);
      continue;
    }

    compounded = (compounded ?? 1) * (1 + r);
    if (runningPeak === null || compounded > runningPeak) {
      runningPeak = compounded;
    }

    growth.push(compounded);
    peak.push(runningPeak);
    drawdown.push((compounded - runningPeak) / runningPeak);
  }

  return { growth, peak, drawdown };
}

export function computePerformance(levels: readonly Maybe[]): PerformanceSeries {
  const returns = periodReturns(levels);
  return { returns, ...growthAndDrawdown(returns) };
}

/**
 * Most negative drawdown in a slice, or null when the slice has none.
 *
 * @example
 * maxDrawdown([0, -0.05, null, -0.12, -0.03]) // -0.12
 */
export function maxDrawdown(drawdowns: readonly Maybe[]): Maybe {
  return minOfDefined(drawdowns);
}

// ---------------------------------------------------------------------------
// Table
// ---------------------------------------------------------------------------

/**
 * Performance series for each requested instrument column.
 */
export function computePerformanceTable(
  table: InstrumentTable,
  instruments: readonly string[],
): PerformanceTable {
  const series: Record<string, PerformanceSeries> = {};
  for (const symbol of instruments) {
    series[symbol] = computePerformance(table.rows.map((row) => row.levels[symbol] ?? null));
  }
  return { dates: table.rows.map((row) => row.date), series };
}
