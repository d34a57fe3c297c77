/**
 * Synthetic market data for the regime backtest tests.
 */

import type { Maybe } from "../../lib/math-utils.ts";
import { periodEnd } from "../cadence-resampler.ts";
import type { CreditClass, RegimeCode, RegimeObservation, StressClass } from "../regime-classifier.ts";
import type { BacktestInput, IndicatorRow, InstrumentTable } from "../regime-types.ts";

/** Deterministic pseudo-random generator in [0, 1). */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

/**
 * Consecutive month-end dates starting at the given "YYYY-MM".
 *
 * @example
 * monthEnds("2023-11", 3) // ["2023-11-30", "2023-12-31", "2024-01-31"]
 */
export function monthEnds(start: string, count: number): string[] {
  const year = Number(start.slice(0, 4));
  const month = Number(start.slice(5, 7)) - 1;
  return Array.from({ length: count }, (_, k) => {
    const idx = month + k;
    const y = year + Math.floor(idx / 12);
    const m = String((idx % 12) + 1).padStart(2, "0");
    return periodEnd(`${y}-${m}-01`, "monthly");
  });
}

export function indicatorRows(dates: readonly string[], x: readonly Maybe[], y: readonly Maybe[]): IndicatorRow[] {
  return dates.map((date, i) => ({ date, stressHorizon: x[i] ?? null, creditStress: y[i] ?? null }));
}

export function instrumentTable(dates: readonly string[], levels: Record<string, readonly Maybe[]>): InstrumentTable {
  const instruments = Object.keys(levels);
  return {
    instruments,
    rows: dates.map((date, i) => ({
      date,
      levels: Object.fromEntries(instruments.map((s) => [s, levels[s][i] ?? null])),
    })),
  };
}

/**
 * Random-walk instruments and noisy indicators over `months` month ends.
 */
export function syntheticInput(
  months: number,
  instruments: readonly string[],
  seed = 42,
  start = "2010-01",
): BacktestInput {
  const rand = seededRandom(seed);
  const dates = monthEnds(start, months);

  const indicators = dates.map((date) => ({
    date,
    stressHorizon: 0.8 + 0.4 * rand(),
    creditStress: 2.5 + 3 * rand(),
  }));

  const levels: Record<string, number[]> = {};
  for (const symbol of instruments) {
    let level = 100;
    levels[symbol] = dates.map(() => {
      level *= 1 + (rand() - 0.48) * 0.12;
      return level;
    });
  }

  return { indicators, instruments: instrumentTable(dates, levels) };
}

const AXES: Record<RegimeCode, [StressClass, CreditClass]> = {
  Low_Easy: ["Low", "Easy"],
  Low_Tight: ["Low", "Tight"],
  High_Easy: ["High", "Easy"],
  High_Tight: ["High", "Tight"],
};

/** Classified observation with placeholder values and the given label. */
export function observation(date: string, regime: RegimeCode | null): RegimeObservation {
  return {
    date,
    stressHorizon: 1,
    creditStress: 3,
    stressThreshold: regime ? 1 : null,
    creditThreshold: regime ? 3 : null,
    stressClass: regime ? AXES[regime][0] : null,
    creditClass: regime ? AXES[regime][1] : null,
    regime,
  };
}
