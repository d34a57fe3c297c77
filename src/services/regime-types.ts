/**
 * Shared input types for the regime backtest engine.
 *
 * Dates are ISO calendar dates ("YYYY-MM-DD"), which sort chronologically as
 * plain strings. Missing observations are `null`.
 */

import type { Maybe } from "../lib/math-utils.ts";

export const CADENCES = ["monthly", "quarterly"] as const;

/** Sampling interval of a derived series. */
export type Cadence = (typeof CADENCES)[number];

export function isCadence(value: string): value is Cadence {
  return value === "monthly" || value === "quarterly";
}

/** One row of the indicator table. */
export interface IndicatorRow {
  date: string;
  /** X: near-term over longer-term volatility expectation (VIX 1M / 3M) */
  stressHorizon: Maybe;
  /** Y: high-yield minus investment-grade credit spread */
  creditStress: Maybe;
}

export interface InstrumentRow {
  date: string;
  /** Price level per instrument symbol */
  levels: Record<string, Maybe>;
}

export interface InstrumentTable {
  /** Column order as read from the source */
  instruments: string[];
  rows: InstrumentRow[];
}

export interface BacktestInput {
  indicators: IndicatorRow[];
  instruments: InstrumentTable;
}

/**
 * Explicit configuration threaded into every core entry point.
 */
export interface RegimeBacktestConfig {
  /** Trailing window (observations) for the monthly thresholds */
  windowLength: number;
  /** Maximum length of each favourite/unfavourite list */
  rankingBreadth: number;
  /** Instruments to condition on; each must be a column of the instrument table */
  instruments: readonly string[];
}
