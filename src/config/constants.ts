// ---------------------------------------------------------------------------
// Instrument catalogue
// ---------------------------------------------------------------------------

export interface InstrumentInfo {
  symbol: string;
  sector: string;
}

/** SPDR sector ETFs tracked as sector proxies. */
export const SECTOR_INSTRUMENTS: readonly InstrumentInfo[] = [
  { symbol: "XLK", sector: "Technology" },
  { symbol: "XLF", sector: "Financials" },
  { symbol: "XLV", sector: "Health Care" },
  { symbol: "XLY", sector: "Consumer Discretionary" },
  { symbol: "XLC", sector: "Communication Services" },
  { symbol: "XLI", sector: "Industrials" },
  { symbol: "XLP", sector: "Consumer Staples" },
  { symbol: "XLE", sector: "Energy" },
  { symbol: "XLU", sector: "Utilities" },
  { symbol: "XLB", sector: "Materials" },
  { symbol: "XLRE", sector: "Real Estate" },
];

// ---------------------------------------------------------------------------
// Backtest defaults
// ---------------------------------------------------------------------------

/** Rolling window for the monthly regime thresholds: 60 months (5 years) */
export const DEFAULT_WINDOW_MONTHS = 60;

/** Favourite/unfavourite list length per regime */
export const DEFAULT_RANKING_BREADTH = 4;

/** Shortest quarterly window, whatever the monthly window */
export const MIN_QUARTERLY_WINDOW = 4;

/** Months per quarter, used to shorten the window at the quarterly cadence */
export const MONTHS_PER_QUARTER = 3;

/** Threshold percentile for both regime axes (median) */
export const REGIME_THRESHOLD_PERCENTILE = 50;

/** A regime needs at least this many observations before its stats are reported */
export const MIN_REGIME_OBSERVATIONS = 2;

// ---------------------------------------------------------------------------
// Indicator columns
// ---------------------------------------------------------------------------

/**
 * Stress horizon: VIX 1M / VIX 3M ratio (FRED VIXCLS / VXVCLS).
 * Credit stress: HY OAS minus IG OAS (FRED BAMLH0A0HYM2 - BAMLC0A0CM).
 */
export const INDICATOR_COLUMNS = {
  stressHorizon: "VIX_RATIO",
  creditStress: "HY_IG_SPREAD",
} as const;

/** Raw component columns the indicators can be derived from */
export const RAW_INDICATOR_COLUMNS = {
  vixShort: "VIX1M",
  vixLong: "VIX3M",
  highYieldOas: "HY_OAS",
  investmentGradeOas: "IG_OAS",
} as const;

// ---------------------------------------------------------------------------
// File names
// ---------------------------------------------------------------------------

export const DATA_FILES = {
  indicatorsMonthly: "indicators_monthly.csv",
  instrumentsMonthly: "sector_etfs_monthly.csv",
  indicatorsDaily: "indicators_daily.csv",
  instrumentsDaily: "sector_etfs_daily.csv",
} as const;

export const OUTPUT_FILES = {
  results: "backtest_results.json",
  historyMonthly: "quadrant_history_monthly.csv",
} as const;
