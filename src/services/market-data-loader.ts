/**
 * Market Data Loader
 *
 * Reads the indicator and instrument CSVs prepared by the data-acquisition
 * step and turns them into backtest input tables. Offline only: files must
 * already exist under the data directory.
 *
 * Indicator CSV: first column is the date, then either the derived columns
 * (VIX_RATIO, HY_IG_SPREAD) or their raw components (VIX1M, VIX3M, HY_OAS,
 * IG_OAS). Instrument CSV: first column is the date, every other column is an
 * instrument's price level. Empty cells are missing values.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import {
  DATA_FILES,
  INDICATOR_COLUMNS,
  RAW_INDICATOR_COLUMNS,
} from "../config/constants.ts";
import { PreconditionError } from "../lib/errors.ts";
import type { Maybe } from "../lib/math-utils.ts";
import { resampleIndicators, resampleInstruments } from "./cadence-resampler.ts";
import type { BacktestInput, IndicatorRow, InstrumentTable } from "./regime-types.ts";
import { logger } from "./structured-logger.ts";

const csvRecordsSchema = z.array(z.array(z.string()));

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}/;

interface CsvTable {
  header: string[];
  rows: string[][];
}

function readCsv(text: string, source: string): CsvTable {
  const parsed: unknown = parse(text, {
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    bom: true,
  });
  const records = csvRecordsSchema.parse(parsed);
  if (records.length === 0) {
    throw new PreconditionError(`${source} is empty`, {
      expected: "a header row followed by data rows",
      actual: "no rows",
    });
  }
  const [header, ...rows] = records;
  return { header, rows };
}

/**
 * "2024-01-31 00:00:00" → "2024-01-31".
 */
function normalizeDate(raw: string, source: string, line: number): string {
  const match = ISO_DATE_PATTERN.exec(raw);
  if (!match) {
    throw new PreconditionError(`${source} line ${line}: unreadable date "${raw}"`, {
      expected: "dates in YYYY-MM-DD form",
      actual: raw,
    });
  }
  return match[0];
}

/**
 * Empty, "NaN" or otherwise non-numeric cells are missing.
 */
export function parseCell(raw: string | undefined): Maybe {
  if (raw === undefined || raw === "") return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

function byDate<T extends { date: string }>(rows: T[]): T[] {
  return rows.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

// ---------------------------------------------------------------------------
// Indicators
// ---------------------------------------------------------------------------

type IndicatorSource =
  | { kind: "derived"; column: number }
  | { kind: "components"; left: number; right: number };

function resolveIndicator(
  header: string[],
  derived: string,
  left: string,
  right: string,
): IndicatorSource | null {
  const column = header.indexOf(derived);
  if (column > 0) return { kind: "derived", column };
  const l = header.indexOf(left);
  const r = header.indexOf(right);
  if (l > 0 && r > 0) return { kind: "components", left: l, right: r };
  return null;
}

export function parseIndicatorCsv(text: string, source = "indicator CSV"): IndicatorRow[] {
  const { header, rows } = readCsv(text, source);

  const stress = resolveIndicator(
    header,
    INDICATOR_COLUMNS.stressHorizon,
    RAW_INDICATOR_COLUMNS.vixShort,
    RAW_INDICATOR_COLUMNS.vixLong,
  );
  const credit = resolveIndicator(
    header,
    INDICATOR_COLUMNS.creditStress,
    RAW_INDICATOR_COLUMNS.highYieldOas,
    RAW_INDICATOR_COLUMNS.investmentGradeOas,
  );

  if (!stress || !credit) {
    const missingColumns = [
      ...(stress ? [] : [INDICATOR_COLUMNS.stressHorizon]),
      ...(credit ? [] : [INDICATOR_COLUMNS.creditStress]),
    ];
    throw new PreconditionError(`${source} is missing indicator columns: ${missingColumns.join(", ")}`, {
      expected: `${INDICATOR_COLUMNS.stressHorizon} (or ${RAW_INDICATOR_COLUMNS.vixShort}+${RAW_INDICATOR_COLUMNS.vixLong}) and ${INDICATOR_COLUMNS.creditStress} (or ${RAW_INDICATOR_COLUMNS.highYieldOas}+${RAW_INDICATOR_COLUMNS.investmentGradeOas})`,
      actual: `columns ${header.join(", ")}`,
      missingColumns,
      availableColumns: header,
    });
  }

  const stressValue = (cells: string[]): Maybe => {
    if (stress.kind === "derived") return parseCell(cells[stress.column]);
    const short = parseCell(cells[stress.left]);
    const long = parseCell(cells[stress.right]);
    return short !== null && long !== null && long !== 0 ? short / long : null;
  };
  const creditValue = (cells: string[]): Maybe => {
    if (credit.kind === "derived") return parseCell(cells[credit.column]);
    const hy = parseCell(cells[credit.left]);
    const ig = parseCell(cells[credit.right]);
    return hy !== null && ig !== null ? hy - ig : null;
  };

  return byDate(
    rows.map((cells, i) => ({
      date: normalizeDate(cells[0] ?? "", source, i + 2),
      stressHorizon: stressValue(cells),
      creditStress: creditValue(cells),
    })),
  );
}

// ---------------------------------------------------------------------------
// Instruments
// ---------------------------------------------------------------------------

export function parseInstrumentCsv(text: string, source = "instrument CSV"): InstrumentTable {
  const { header, rows } = readCsv(text, source);
  const instruments = header.slice(1);

  return {
    instruments,
    rows: byDate(
      rows.map((cells, i) => ({
        date: normalizeDate(cells[0] ?? "", source, i + 2),
        levels: Object.fromEntries(instruments.map((symbol, k) => [symbol, parseCell(cells[k + 1])])),
      })),
    ),
  };
}

// ---------------------------------------------------------------------------
// Directory loader
// ---------------------------------------------------------------------------

export interface LoadOptions {
  /** Read the daily files and coarsen them to month ends */
  fromDaily?: boolean;
}

function readRequiredFile(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new PreconditionError(`Input file not found: ${filePath}`, {
      expected: `a CSV file at ${filePath}`,
      actual: "file does not exist",
    });
  }
  return fs.readFileSync(filePath, "utf-8");
}

/**
 * Load both input tables from a data directory.
 */
export function loadMarketData(dataDir: string, options: LoadOptions = {}): BacktestInput {
  const indicatorFile = path.resolve(
    dataDir,
    options.fromDaily ? DATA_FILES.indicatorsDaily : DATA_FILES.indicatorsMonthly,
  );
  const instrumentFile = path.resolve(
    dataDir,
    options.fromDaily ? DATA_FILES.instrumentsDaily : DATA_FILES.instrumentsMonthly,
  );

  let indicators = parseIndicatorCsv(readRequiredFile(indicatorFile), path.basename(indicatorFile));
  let instruments = parseInstrumentCsv(readRequiredFile(instrumentFile), path.basename(instrumentFile));

  if (options.fromDaily) {
    indicators = resampleIndicators(indicators, "monthly");
    instruments = resampleInstruments(instruments, "monthly");
  }

  logger.info("market-data", "Loaded input tables", {
    indicatorFile,
    instrumentFile,
    indicatorRows: indicators.length,
    instrumentRows: instruments.rows.length,
    instruments: instruments.instruments,
    resampled: options.fromDaily === true,
  });

  return { indicators, instruments };
}
