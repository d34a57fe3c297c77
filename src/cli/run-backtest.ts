#!/usr/bin/env node
/**
 * Regime Backtest CLI
 *
 * Loads the indicator and sector CSVs, runs the monthly and quarterly
 * backtests, writes the results and prints a summary.
 *
 * Usage:
 *   npm run backtest
 *   npm run backtest -- --window 36 --breadth 3
 *   npm run backtest -- --daily --data-dir ./data
 */

import { SECTOR_INSTRUMENTS } from "../config/constants.ts";
import { env } from "../config/env.ts";
import { AppError, errorMessage } from "../lib/errors.ts";
import { round4 } from "../lib/math-utils.ts";
import type { BacktestResult, CadenceResult } from "../schemas/backtest-result.ts";
import { loadMarketData } from "../services/market-data-loader.ts";
import { runRegimeBacktest } from "../services/regime-backtest.ts";
import { saveBacktestResult } from "../services/results-store.ts";
import { logger } from "../services/structured-logger.ts";
import { parseBacktestArgs, USAGE } from "./backtest-args.ts";

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

function print(msg: string) {
  console.log(msg);
}

function printHeader(title: string) {
  print("");
  print("=".repeat(60));
  print(`  ${title}`);
  print("=".repeat(60));
}

function label(symbols: readonly string[]): string {
  if (symbols.length === 0) return "-";
  return symbols
    .map((symbol) => {
      const sector = SECTOR_INSTRUMENTS.find((i) => i.symbol === symbol)?.sector;
      return sector ? `${symbol} (${sector})` : symbol;
    })
    .join(", ");
}

function printCadence(run: CadenceResult) {
  printHeader(`${run.cadence.toUpperCase()} (window ${run.windowLength}, ${run.observationCount} observations)`);
  if (run.stats.length === 0) {
    print("  No regime has enough observations for statistics.");
    return;
  }
  for (const stat of run.stats) {
    const ranking = run.rankings.find((r) => r.regime === stat.regime);
    print("");
    print(`  ${stat.regime} (${stat.regimeName}): ${stat.count} periods`);
    if (ranking) {
      print(`    Favourites by return:    ${label(ranking.favoritesByReturn)}`);
      print(`    Unfavourites by return:  ${label(ranking.unfavoritesByReturn)}`);
      print(`    Favourites by drawdown:  ${label(ranking.favoritesByDrawdown)}`);
      print(`    Unfavourites by drawdown: ${label(ranking.unfavoritesByDrawdown)}`);
    }
  }
}

function printCurrent(result: BacktestResult) {
  printHeader("CURRENT REGIME");
  const current = result.current;
  if (!current) {
    print("  Not enough indicator history for a rolling median at the latest date.");
    return;
  }
  print(`  As of ${current.date}: ${current.regime} (${current.regimeName})`);
  print(`    VIX ratio     ${round4(current.stressHorizon)} vs median ${round4(current.stressThreshold)} → ${current.stressClass}`);
  print(`    HY-IG spread  ${round4(current.creditStress)} vs median ${round4(current.creditThreshold)} → ${current.creditClass}`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function main(): number {
  const args = parseBacktestArgs(process.argv.slice(2), env);
  if (args.help) {
    print(USAGE);
    return 0;
  }

  const input = loadMarketData(args.dataDir, { fromDaily: args.fromDaily });
  const result = runRegimeBacktest(input, {
    windowLength: args.windowLength,
    rankingBreadth: args.rankingBreadth,
    instruments: args.instruments ?? input.instruments.instruments,
  });
  const paths = saveBacktestResult(result, args.outputDir);

  printCadence(result.monthly);
  printCadence(result.quarterly);
  printCurrent(result);
  print("");
  print(`Results written to ${paths.resultsFile}`);
  print(`Regime history written to ${paths.historyFile}`);
  return 0;
}

try {
  process.exitCode = main();
} catch (err) {
  if (err instanceof AppError) {
    logger.error("cli", err.message, err, { code: err.errorCode, details: err.details });
  } else {
    logger.fatal("cli", `Backtest failed: ${errorMessage(err)}`, err instanceof Error ? err : undefined);
  }
  process.exitCode = 1;
}
