/**
 * Regime Backtest Engine
 *
 * Classifies indicator history into four regimes (stress horizon × credit
 * stress), then measures how each tracked instrument performed inside each
 * regime. The same pipeline runs twice: at the monthly cadence of the input,
 * and at a quarterly cadence re-derived from it with a shorter window.
 *
 * Everything here is a pure function of the input tables and an explicit
 * configuration; two runs with different windows can share nothing.
 */

import { ConfigError, PreconditionError, type DateRange } from "../lib/errors.ts";
import { isDefined } from "../lib/math-utils.ts";
import {
  regimeBacktestConfigSchema,
  type BacktestResult,
  type CadenceResult,
  type RegimeHistoryEntry,
} from "../schemas/backtest-result.ts";
import { resampleIndicators, resampleInstruments } from "./cadence-resampler.ts";
import { evaluateCurrentRegime } from "./current-regime.ts";
import { classifyRegimes, regimeName, windowForCadence } from "./regime-classifier.ts";
import { asOf, conditionOnRegimes, type AlignedRegime } from "./regime-conditioning.ts";
import { rankRegimes } from "./regime-ranking.ts";
import { computePerformanceTable } from "./return-drawdown.ts";
import type {
  BacktestInput,
  Cadence,
  IndicatorRow,
  InstrumentTable,
  RegimeBacktestConfig,
} from "./regime-types.ts";
import {
  logBacktestComplete,
  logBacktestStart,
  logCadenceSummary,
  timeOperation,
  withContext,
} from "./structured-logger.ts";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Run IDs: bt_{timestamp}_{6-char base-36 suffix} */
const RUN_ID_SUFFIX_START = 2;
const RUN_ID_SUFFIX_LENGTH = 6;

function generateRunId(): string {
  const suffix = Math.random()
    .toString(36)
    .slice(RUN_ID_SUFFIX_START, RUN_ID_SUFFIX_START + RUN_ID_SUFFIX_LENGTH);
  return `bt_${Date.now()}_${suffix}`;
}

export function validateConfig(config: RegimeBacktestConfig): RegimeBacktestConfig {
  const result = regimeBacktestConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid backtest configuration: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Input preconditions
// ---------------------------------------------------------------------------

export function dateRange(dates: readonly string[]): DateRange | null {
  if (dates.length === 0) return null;
  return { start: dates[0], end: dates[dates.length - 1] };
}

function byDate<T extends { date: string }>(rows: readonly T[]): T[] {
  return [...rows].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

function firstDuplicate(dates: readonly string[]): string | null {
  for (let i = 1; i < dates.length; i++) {
    if (dates[i] === dates[i - 1]) return dates[i];
  }
  return null;
}

/**
 * Sort both tables, drop indicator rows with neither value, and reject
 * inputs that cannot support a backtest.
 */
export function prepareInput(input: BacktestInput, config: RegimeBacktestConfig): BacktestInput {
  const indicators = byDate(input.indicators).filter(
    (row) => isDefined(row.stressHorizon) || isDefined(row.creditStress),
  );
  const rows = byDate(input.instruments.rows);

  if (indicators.length === 0) {
    throw new PreconditionError("Indicator table has no usable observations", {
      expected: "at least one row with a stress-horizon or credit-stress value",
      actual: `${input.indicators.length} rows, none with a value`,
    });
  }
  if (rows.length === 0) {
    throw new PreconditionError("Instrument table has no rows", {
      expected: "at least one row of instrument levels",
      actual: "0 rows",
    });
  }

  const missingColumns = config.instruments.filter((s) => !input.instruments.instruments.includes(s));
  if (missingColumns.length > 0) {
    throw new PreconditionError(`Instrument table is missing columns: ${missingColumns.join(", ")}`, {
      expected: `columns ${config.instruments.join(", ")}`,
      actual: `columns ${input.instruments.instruments.join(", ")}`,
      missingColumns,
      availableColumns: [...input.instruments.instruments],
    });
  }

  const indicatorDates = indicators.map((r) => r.date);
  const instrumentDates = rows.map((r) => r.date);

  for (const [table, dates] of [["indicator", indicatorDates], ["instrument", instrumentDates]] as const) {
    const duplicate = firstDuplicate(dates);
    if (duplicate) {
      throw new PreconditionError(`Duplicate ${table} date ${duplicate}`, {
        expected: `unique ${table} dates`,
        actual: `${duplicate} appears more than once`,
      });
    }
  }

  const indicatorRange = dateRange(indicatorDates);
  const instrumentRange = dateRange(instrumentDates);
  if (
    indicatorRange &&
    instrumentRange &&
    (indicatorRange.start > instrumentRange.end || instrumentRange.start > indicatorRange.end)
  ) {
    throw new PreconditionError("Indicator and instrument tables do not overlap in time", {
      expected: "overlapping indicator and instrument date ranges",
      actual: `indicators ${indicatorRange.start}..${indicatorRange.end}, instruments ${instrumentRange.start}..${instrumentRange.end}`,
      indicatorRange,
      instrumentRange,
    });
  }

  return { indicators, instruments: { instruments: [...input.instruments.instruments], rows } };
}

// ---------------------------------------------------------------------------
// Cadence pass
// ---------------------------------------------------------------------------

/** Raw values come from `raw`, the latest indicator row at the entry date. */
function toHistoryEntry(aligned: AlignedRegime, raw: IndicatorRow | null): RegimeHistoryEntry {
  const source = aligned.source;
  return {
    date: aligned.date,
    labelDate: source?.date ?? null,
    stressHorizon: raw?.stressHorizon ?? null,
    creditStress: raw?.creditStress ?? null,
    stressThreshold: source?.stressThreshold ?? null,
    creditThreshold: source?.creditThreshold ?? null,
    stressClass: source?.stressClass ?? null,
    creditClass: source?.creditClass ?? null,
    regime: aligned.regime,
    regimeName: aligned.regime ? regimeName(aligned.regime) : null,
  };
}

/**
 * Classify at one cadence with the given window and condition the
 * instrument returns of the same cadence on the result.
 */
export function runCadence(
  cadence: Cadence,
  indicators: readonly IndicatorRow[],
  instruments: InstrumentTable,
  windowLength: number,
  config: RegimeBacktestConfig,
): CadenceResult {
  return withContext({ cadence }, () => {
    const labels = classifyRegimes(indicators, windowLength);
    const perf = computePerformanceTable(instruments, config.instruments);
    const conditioned = conditionOnRegimes(labels, perf, config.instruments);
    const raw = asOf(indicators, conditioned.aligned.map((entry) => entry.date));

    const counts: Record<string, number> = {};
    for (const entry of conditioned.aligned) {
      if (entry.regime) counts[entry.regime] = (counts[entry.regime] ?? 0) + 1;
    }
    logCadenceSummary(cadence, {
      windowLength,
      observations: conditioned.observationCount,
      regimes: counts,
      dropped: conditioned.dropped,
    });

    return {
      cadence,
      windowLength,
      observationCount: conditioned.observationCount,
      stats: conditioned.stats,
      rankings: rankRegimes(conditioned.stats, config.rankingBreadth),
      history: conditioned.aligned.map((entry, i) => toHistoryEntry(entry, raw[i])),
    };
  });
}

// ---------------------------------------------------------------------------
// Full run
// ---------------------------------------------------------------------------

/**
 * Run the monthly and quarterly backtests and evaluate the current regime.
 *
 * @throws ConfigError when the configuration is out of range
 * @throws PreconditionError when the inputs cannot support a backtest
 */
export function runRegimeBacktest(
  input: BacktestInput,
  config: RegimeBacktestConfig,
  options: { runId?: string } = {},
): BacktestResult {
  const cfg = validateConfig(config);
  const runId = options.runId ?? generateRunId();
  const coarseWindowLength = windowForCadence("quarterly", cfg.windowLength);

  return withContext({ runId }, () => {
    const { result, durationMs } = timeOperation("regime-backtest", "runRegimeBacktest", () => {
      const prepared = prepareInput(input, cfg);
      logBacktestStart(runId, {
        windowLength: cfg.windowLength,
        rankingBreadth: cfg.rankingBreadth,
        instruments: cfg.instruments.length,
        indicatorRows: prepared.indicators.length,
        instrumentRows: prepared.instruments.rows.length,
      });

      const monthly = runCadence(
        "monthly",
        prepared.indicators,
        prepared.instruments,
        windowForCadence("monthly", cfg.windowLength),
        cfg,
      );
      const quarterly = runCadence(
        "quarterly",
        resampleIndicators(prepared.indicators, "quarterly"),
        resampleInstruments(prepared.instruments, "quarterly"),
        coarseWindowLength,
        cfg,
      );

      const backtest: BacktestResult = {
        config: {
          windowLength: cfg.windowLength,
          coarseWindowLength,
          rankingBreadth: cfg.rankingBreadth,
          instruments: [...cfg.instruments],
        },
        monthly,
        quarterly,
        current: evaluateCurrentRegime(prepared.indicators, cfg.windowLength),
      };
      return backtest;
    });

    logBacktestComplete(runId, durationMs, result.current?.regime ?? null);
    return result;
  });
}
