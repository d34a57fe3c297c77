/**
 * Results Store
 *
 * Persists a backtest result as JSON plus a flat CSV of the monthly regime
 * history, and reads the JSON back through the result schema so the API
 * never serves a file it cannot vouch for.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { INDICATOR_COLUMNS, OUTPUT_FILES } from "../config/constants.ts";
import { AppError, errorMessage } from "../lib/errors.ts";
import {
  backtestResultSchema,
  type BacktestResult,
  type RegimeHistoryEntry,
} from "../schemas/backtest-result.ts";
import { logger } from "./structured-logger.ts";

export interface SavedResultPaths {
  resultsFile: string;
  historyFile: string;
}

// ---------------------------------------------------------------------------
// JSON
// ---------------------------------------------------------------------------

export function serializeBacktestResult(result: BacktestResult): string {
  return JSON.stringify(result, null, 2);
}

/**
 * @throws AppError (invalid_results_file) when the text is not JSON or does not match the schema
 */
export function parseBacktestResult(text: string, source = "results"): BacktestResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new AppError("INVALID_RESULTS_FILE", `${source} is not valid JSON: ${errorMessage(err)}`);
  }

  const parsed = backtestResultSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new AppError("INVALID_RESULTS_FILE", `${source} does not match the result schema`, {
      issues: issues.slice(0, 20),
    });
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// CSV export
// ---------------------------------------------------------------------------

const HISTORY_HEADERS = [
  "date",
  "label_date",
  INDICATOR_COLUMNS.stressHorizon,
  INDICATOR_COLUMNS.creditStress,
  `${INDICATOR_COLUMNS.stressHorizon}_threshold`,
  `${INDICATOR_COLUMNS.creditStress}_threshold`,
  "stress_class",
  "credit_class",
  "regime",
  "regime_name",
];

function csvCell(value: string | number | null): string {
  if (value === null) return "";
  const s = String(value);
  return s.includes(",") || s.includes('"') || s.includes("\n")
    ? `"${s.replace(/"/g, '""')}"` : s;
}

/**
 * One row per history entry; missing values are empty cells.
 */
export function regimeHistoryToCsv(history: readonly RegimeHistoryEntry[]): string {
  const csvRows = [HISTORY_HEADERS.join(",")];
  for (const entry of history) {
    csvRows.push([
      entry.date, entry.labelDate, entry.stressHorizon, entry.creditStress,
      entry.stressThreshold, entry.creditThreshold, entry.stressClass,
      entry.creditClass, entry.regime, entry.regimeName,
    ].map(csvCell).join(","));
  }
  return csvRows.join("\n");
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

export function saveBacktestResult(result: BacktestResult, outputDir: string): SavedResultPaths {
  fs.mkdirSync(outputDir, { recursive: true });

  const resultsFile = path.join(outputDir, OUTPUT_FILES.results);
  const historyFile = path.join(outputDir, OUTPUT_FILES.historyMonthly);

  fs.writeFileSync(resultsFile, serializeBacktestResult(result) + "\n", "utf-8");
  fs.writeFileSync(historyFile, regimeHistoryToCsv(result.monthly.history) + "\n", "utf-8");

  logger.info("results-store", "Saved backtest results", {
    resultsFile,
    historyFile,
    historyRows: result.monthly.history.length,
  });

  return { resultsFile, historyFile };
}

/**
 * Returns null when no result has been written to the directory yet.
 */
export function loadBacktestResult(outputDir: string): BacktestResult | null {
  const resultsFile = path.join(outputDir, OUTPUT_FILES.results);
  if (!fs.existsSync(resultsFile)) {
    logger.debug("results-store", "No stored results", { resultsFile });
    return null;
  }
  return parseBacktestResult(fs.readFileSync(resultsFile, "utf-8"), resultsFile);
}
