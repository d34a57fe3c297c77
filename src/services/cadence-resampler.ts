/**
 * Cadence Resampler
 *
 * Coarsens a table to month or quarter ends by taking, per column, the last
 * known value inside each period (not an average). Periods are dated at
 * their calendar end; periods with no rows are not emitted.
 */

import { isDefined, type Maybe } from "../lib/math-utils.ts";
import type { Cadence, IndicatorRow, InstrumentTable } from "./regime-types.ts";

/** ISO date slice length: "2024-03-31T00:00:00Z".slice(0, 10) */
const ISO_DATE_LENGTH = 10;

/**
 * Last calendar day of the month or quarter containing `date`.
 *
 * @example
 * periodEnd("2024-02-10", "monthly")   // "2024-02-29"
 * periodEnd("2024-05-31", "quarterly") // "2024-06-30"
 */
export function periodEnd(date: string, cadence: Cadence): string {
  const year = Number(date.slice(0, 4));
  const month = Number(date.slice(5, 7));
  const endMonth = cadence === "monthly" ? month : Math.ceil(month / 3) * 3;
  // Day 0 of the following month is the last day of endMonth
  return new Date(Date.UTC(year, endMonth, 0)).toISOString().slice(0, ISO_DATE_LENGTH);
}

interface WideRow {
  date: string;
  values: Record<string, Maybe>;
}

function lastKnownByPeriod(rows: readonly WideRow[], columns: readonly string[], cadence: Cadence): WideRow[] {
  const periods: WideRow[] = [];
  let current: WideRow | null = null;

  for (const row of rows) {
    const end = periodEnd(row.date, cadence);
    if (current === null || current.date !== end) {
      current = { date: end, values: Object.fromEntries(columns.map((c) => [c, null])) };
      periods.push(current);
    }
    for (const column of columns) {
      const value = row.values[column];
      if (isDefined(value)) current.values[column] = value;
    }
  }

  return periods;
}

export function resampleIndicators(rows: readonly IndicatorRow[], cadence: Cadence): IndicatorRow[] {
  const wide = rows.map((r) => ({
    date: r.date,
    values: { stressHorizon: r.stressHorizon, creditStress: r.creditStress },
  }));
  return lastKnownByPeriod(wide, ["stressHorizon", "creditStress"], cadence).map((p) => ({
    date: p.date,
    stressHorizon: p.values.stressHorizon ?? null,
    creditStress: p.values.creditStress ?? null,
  }));
}

export function resampleInstruments(table: InstrumentTable, cadence: Cadence): InstrumentTable {
  const wide = table.rows.map((r) => ({ date: r.date, values: r.levels }));
  return {
    instruments: [...table.instruments],
    rows: lastKnownByPeriod(wide, table.instruments, cadence).map((p) => ({
      date: p.date,
      levels: p.values,
    })),
  };
}
