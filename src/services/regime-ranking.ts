/**
 * Ranking Engine
 *
 * Favourite/unfavourite instruments per regime from conditional mean return
 * and mean drawdown. Instruments without a statistic are never listed; equal
 * values order by symbol.
 */

import { isDefined, type Maybe } from "../lib/math-utils.ts";
import type { RegimeCode } from "./regime-classifier.ts";
import type { ConditionalStat } from "./regime-conditioning.ts";

export interface RegimeRanking {
  favoritesByReturn: string[];
  /** Worst N by return, ending with the very worst */
  unfavoritesByReturn: string[];
  /** Least negative mean drawdown first */
  favoritesByDrawdown: string[];
  /** Deepest N by drawdown, ending with the deepest */
  unfavoritesByDrawdown: string[];
}

export interface RegimeRankingEntry extends RegimeRanking {
  regime: RegimeCode;
}

/**
 * Defined entries sorted by value descending, ties by symbol ascending.
 */
function sortDescending(values: Record<string, Maybe>): string[] {
  return Object.entries(values)
    .filter((entry): entry is [string, number] => isDefined(entry[1]))
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .map(([symbol]) => symbol);
}

function head(items: string[], n: number): string[] {
  return items.slice(0, n);
}

function tail(items: string[], n: number): string[] {
  return items.slice(Math.max(0, items.length - n));
}

/**
 * @example
 * rankInstruments({ A: 0.02, B: -0.01, C: 0.05 }, { A: -0.1, B: -0.02, C: -0.3 }, 2)
 * // favoritesByReturn ["C", "A"], unfavoritesByReturn ["A", "B"],
 * // favoritesByDrawdown ["B", "A"], unfavoritesByDrawdown ["A", "C"]
 */
export function rankInstruments(
  meanReturn: Record<string, Maybe>,
  meanDrawdown: Record<string, Maybe>,
  breadth: number,
): RegimeRanking {
  const byReturn = sortDescending(meanReturn);
  const byDrawdown = sortDescending(meanDrawdown);

  return {
    favoritesByReturn: head(byReturn, breadth),
    unfavoritesByReturn: tail(byReturn, breadth),
    favoritesByDrawdown: head(byDrawdown, breadth),
    unfavoritesByDrawdown: tail(byDrawdown, breadth),
  };
}

export function rankRegimes(stats: readonly ConditionalStat[], breadth: number): RegimeRankingEntry[] {
  return stats.map((stat) => ({
    regime: stat.regime,
    ...rankInstruments(stat.meanReturn, stat.meanDrawdown, breadth),
  }));
}
