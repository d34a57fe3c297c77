/**
 * Regime Classifier
 *
 * Crosses two binary axis classifications into one of four regimes:
 *   X (stress horizon)  ≥ rolling median → "High", else "Low"
 *   Y (credit stress)   ≥ rolling median → "Tight", else "Easy"
 * Ties fall on the High/Tight side. A regime exists only where both
 * thresholds and both raw values are defined.
 */

import {
  MIN_QUARTERLY_WINDOW,
  MONTHS_PER_QUARTER,
  REGIME_THRESHOLD_PERCENTILE,
} from "../config/constants.ts";
import { isDefined, type Maybe } from "../lib/math-utils.ts";
import { percentileAt, rollingPercentile } from "./rolling-percentile.ts";
import type { Cadence, IndicatorRow } from "./regime-types.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StressClass = "Low" | "High";
export type CreditClass = "Easy" | "Tight";
export type RegimeCode = `${StressClass}_${CreditClass}`;

/** Canonical ordering used for every per-regime listing. */
export const REGIME_CODES = [
  "Low_Easy",
  "Low_Tight",
  "High_Easy",
  "High_Tight",
] as const satisfies readonly RegimeCode[];

const REGIME_NAMES: Record<RegimeCode, string> = {
  Low_Easy: "Stable expansion (Risk-on)",
  Low_Tight: "Late cycle (Selective)",
  High_Easy: "Shock regime (Buy recovery)",
  High_Tight: "Structural stress (Capital preservation)",
};

/** Classification of a single indicator observation. */
export interface RegimeObservation {
  date: string;
  stressHorizon: Maybe;
  creditStress: Maybe;
  stressThreshold: Maybe;
  creditThreshold: Maybe;
  stressClass: StressClass | null;
  creditClass: CreditClass | null;
  regime: RegimeCode | null;
}

// ---------------------------------------------------------------------------
// Regime codes
// ---------------------------------------------------------------------------

export function regimeCode(stress: StressClass, credit: CreditClass): RegimeCode {
  return `${stress}_${credit}`;
}

export function regimeName(code: RegimeCode): string {
  return REGIME_NAMES[code];
}

/**
 * Trailing window for a cadence. Quarterly observations span three months
 * each, so the count shrinks to keep a comparable span.
 *
 * @example
 * windowForCadence("monthly", 60)   // 60
 * windowForCadence("quarterly", 60) // 20
 * windowForCadence("quarterly", 9)  // 4
 */
export function windowForCadence(cadence: Cadence, monthlyWindow: number): number {
  if (cadence === "monthly") return monthlyWindow;
  return Math.max(MIN_QUARTERLY_WINDOW, Math.floor(monthlyWindow / MONTHS_PER_QUARTER));
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

function classify(
  date: string,
  stressHorizon: Maybe,
  creditStress: Maybe,
  stressThreshold: Maybe,
  creditThreshold: Maybe,
): RegimeObservation {
  const stressClass: StressClass | null =
    isDefined(stressHorizon) && isDefined(stressThreshold)
      ? stressHorizon >= stressThreshold ? "High" : "Low"
      : null;
  const creditClass: CreditClass | null =
    isDefined(creditStress) && isDefined(creditThreshold)
      ? creditStress >= creditThreshold ? "Tight" : "Easy"
      : null;

  return {
    date,
    stressHorizon,
    creditStress,
    stressThreshold,
    creditThreshold,
    stressClass,
    creditClass,
    regime: stressClass && creditClass ? regimeCode(stressClass, creditClass) : null,
  };
}

/**
 * Classify every indicator row against rolling medians of its own history.
 */
export function classifyRegimes(rows: readonly IndicatorRow[], window: number): RegimeObservation[] {
  const stress = rows.map((r) => r.stressHorizon);
  const credit = rows.map((r) => r.creditStress);
  const stressMedian = rollingPercentile(stress, window, REGIME_THRESHOLD_PERCENTILE);
  const creditMedian = rollingPercentile(credit, window, REGIME_THRESHOLD_PERCENTILE);

  return rows.map((row, i) =>
    classify(row.date, row.stressHorizon, row.creditStress, stressMedian[i], creditMedian[i]),
  );
}

/**
 * Classify a single row using only the history up to and including it.
 * Same thresholds as classifyRegimes() produces at that position.
 */
export function classifyAt(rows: readonly IndicatorRow[], index: number, window: number): RegimeObservation {
  const row = rows[index];
  const stressThreshold = percentileAt(rows.map((r) => r.stressHorizon), index, window, REGIME_THRESHOLD_PERCENTILE);
  const creditThreshold = percentileAt(rows.map((r) => r.creditStress), index, window, REGIME_THRESHOLD_PERCENTILE);
  return classify(row.date, row.stressHorizon, row.creditStress, stressThreshold, creditThreshold);
}
