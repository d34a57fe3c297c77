/**
 * Current-State Evaluator
 *
 * Point read of the live regime at the latest complete indicator row, using
 * exactly the thresholds the historical classifier would produce there.
 */

import { isDefined } from "../lib/math-utils.ts";
import {
  classifyAt,
  regimeName,
  type CreditClass,
  type RegimeCode,
  type StressClass,
} from "./regime-classifier.ts";
import type { IndicatorRow } from "./regime-types.ts";

export interface CurrentRegime {
  date: string;
  stressHorizon: number;
  creditStress: number;
  stressThreshold: number;
  creditThreshold: number;
  stressClass: StressClass;
  creditClass: CreditClass;
  regime: RegimeCode;
  regimeName: string;
}

function latestCompleteRow(rows: readonly IndicatorRow[]): number {
  for (let i = rows.length - 1; i >= 0; i--) {
    if (isDefined(rows[i].stressHorizon) && isDefined(rows[i].creditStress)) return i;
  }
  return -1;
}

/**
 * Returns null when no row has both indicators, or when the history up to the
 * latest row is still too short for a threshold.
 */
export function evaluateCurrentRegime(rows: readonly IndicatorRow[], window: number): CurrentRegime | null {
  const index = latestCompleteRow(rows);
  if (index < 0) return null;

  const obs = classifyAt(rows, index, window);
  const { stressHorizon, creditStress, stressThreshold, creditThreshold } = obs;
  if (
    !isDefined(stressHorizon) ||
    !isDefined(creditStress) ||
    !isDefined(stressThreshold) ||
    !isDefined(creditThreshold) ||
    !obs.stressClass ||
    !obs.creditClass ||
    !obs.regime
  ) {
    return null;
  }

  return {
    date: obs.date,
    stressHorizon,
    creditStress,
    stressThreshold,
    creditThreshold,
    stressClass: obs.stressClass,
    creditClass: obs.creditClass,
    regime: obs.regime,
    regimeName: regimeName(obs.regime),
  };
}
