/**
 * Alignment & Conditioning Engine
 *
 * Carries regime labels onto return timestamps (as-of join: the latest label
 * dated at or before each return date, never a later one), then partitions
 * the return/drawdown rows by regime and averages them per instrument.
 *
 * A label dated at the start of a period governs the return realised over
 * that period.
 */

import { MIN_REGIME_OBSERVATIONS } from "../config/constants.ts";
import { groupBy, isDefined, meanOfDefined, type Maybe } from "../lib/math-utils.ts";
import {
  REGIME_CODES,
  regimeName,
  type RegimeCode,
  type RegimeObservation,
} from "./regime-classifier.ts";
import { maxDrawdown, type PerformanceTable } from "./return-drawdown.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AlignedRegime {
  /** Return timestamp */
  date: string;
  /** Observation the label was carried from, null when none precedes `date` */
  source: RegimeObservation | null;
  regime: RegimeCode | null;
}

export interface ConditionalStat {
  regime: RegimeCode;
  regimeName: string;
  count: number;
  meanReturn: Record<string, Maybe>;
  meanDrawdown: Record<string, Maybe>;
  maxDrawdown: Record<string, Maybe>;
}

export interface ConditioningResult {
  /** One entry per return row, in date order */
  aligned: AlignedRegime[];
  /** Stats for regimes with enough members, canonical regime order */
  stats: ConditionalStat[];
  /** Rows with a known regime */
  observationCount: number;
  /** Regimes that had members but fewer than the minimum */
  dropped: RegimeCode[];
}

// ---------------------------------------------------------------------------
// Alignment
// ---------------------------------------------------------------------------

/**
 * Latest row dated at or before each target date, or null when none is.
 * Both inputs must be in ascending date order.
 *
 * @example
 * asOf([{ date: "2024-01-31" }], ["2024-01-15", "2024-02-10"]) // [null, { date: "2024-01-31" }]
 */
export function asOf<T extends { date: string }>(rows: readonly T[], targetDates: readonly string[]): (T | null)[] {
  const matched: (T | null)[] = [];
  let cursor = 0;
  let latest: T | null = null;

  for (const date of targetDates) {
    while (cursor < rows.length && rows[cursor].date <= date) {
      latest = rows[cursor];
      cursor++;
    }
    matched.push(latest);
  }

  return matched;
}

/**
 * Forward-fill labels onto target dates. Both inputs must be in ascending
 * date order. Observations without a regime never overwrite a known one.
 */
export function alignRegimes(
  labels: readonly RegimeObservation[],
  targetDates: readonly string[],
): AlignedRegime[] {
  const labelled = labels.filter((label) => label.regime !== null);
  return asOf(labelled, targetDates).map((source, i) => ({
    date: targetDates[i],
    source,
    regime: source?.regime ?? null,
  }));
}

/**
 * Rows carrying at least one defined return. The first row of any table
 * never qualifies.
 */
export function returnRowIndices(perf: PerformanceTable, instruments: readonly string[]): number[] {
  const indices: number[] = [];
  perf.dates.forEach((_, i) => {
    if (instruments.some((symbol) => isDefined(perf.series[symbol]?.returns[i]))) {
      indices.push(i);
    }
  });
  return indices;
}

// ---------------------------------------------------------------------------
// Conditioning
// ---------------------------------------------------------------------------

function statForRegime(
  regime: RegimeCode,
  members: readonly number[],
  perf: PerformanceTable,
  instruments: readonly string[],
): ConditionalStat {
  const meanReturn: Record<string, Maybe> = {};
  const meanDrawdown: Record<string, Maybe> = {};
  const worst: Record<string, Maybe> = {};

  for (const symbol of instruments) {
    const series = perf.series[symbol];
    const returns = members.map((i) => series?.returns[i] ?? null);
    const drawdowns = members.map((i) => series?.drawdown[i] ?? null);
    meanReturn[symbol] = meanOfDefined(returns);
    meanDrawdown[symbol] = meanOfDefined(drawdowns);
    worst[symbol] = maxDrawdown(drawdowns);
  }

  return {
    regime,
    regimeName: regimeName(regime),
    count: members.length,
    meanReturn,
    meanDrawdown,
    maxDrawdown: worst,
  };
}

/**
 * Align labels onto the return rows of `perf` and compute per-regime,
 * per-instrument statistics. Regimes with fewer than two member rows are
 * left out.
 */
export function conditionOnRegimes(
  labels: readonly RegimeObservation[],
  perf: PerformanceTable,
  instruments: readonly string[],
): ConditioningResult {
  const rows = returnRowIndices(perf, instruments);
  const aligned = alignRegimes(labels, rows.map((i) => perf.dates[i]));

  const members = groupBy(
    rows.map((rowIndex, k) => ({ rowIndex, regime: aligned[k].regime })),
    (m) => m.regime,
  );

  const stats: ConditionalStat[] = [];
  const dropped: RegimeCode[] = [];
  let observationCount = 0;

  for (const regime of REGIME_CODES) {
    const group = members.get(regime);
    if (!group) continue;
    observationCount += group.length;
    if (group.length < MIN_REGIME_OBSERVATIONS) {
      dropped.push(regime);
      continue;
    }
    stats.push(statForRegime(regime, group.map((m) => m.rowIndex), perf, instruments));
  }

  return { aligned, stats, observationCount, dropped };
}
