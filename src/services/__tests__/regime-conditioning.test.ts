/**
 * Alignment & Conditioning Tests
 *
 * As-of alignment of labels onto return dates (no look-ahead) and the
 * per-regime statistics built on it.
 */

import { describe, it, expect } from "vitest";
import { alignRegimes, asOf, conditionOnRegimes, returnRowIndices } from "../regime-conditioning.ts";
import { classifyRegimes } from "../regime-classifier.ts";
import { computePerformanceTable } from "../return-drawdown.ts";
import { instrumentTable, observation, syntheticInput } from "./helpers.ts";

const DATES = ["2024-01-31", "2024-02-29", "2024-03-31", "2024-04-30", "2024-05-31"];

// ---------------------------------------------------------------------------
// Alignment
// ---------------------------------------------------------------------------

describe("asOf", () => {
  it("matches the latest row at or before each date", () => {
    const rows = [{ date: "2024-01-31" }, { date: "2024-02-29" }, { date: "2024-04-30" }];
    const matched = asOf(rows, ["2024-01-15", "2024-01-31", "2024-03-31", "2024-06-30"]);

    expect(matched).toEqual([null, rows[0], rows[1], rows[2]]);
  });
});

describe("alignRegimes", () => {
  it("carries the latest label at or before each date", () => {
    const labels = [
      observation("2024-01-31", "Low_Easy"),
      observation("2024-02-29", null),
      observation("2024-03-31", "High_Tight"),
    ];
    const aligned = alignRegimes(labels, ["2024-01-15", "2024-01-31", "2024-02-29", "2024-03-15", "2024-03-31"]);

    expect(aligned.map((a) => a.regime)).toEqual([null, "Low_Easy", "Low_Easy", "Low_Easy", "High_Tight"]);
    expect(aligned[3].source?.date).toBe("2024-01-31");
    expect(aligned[0].source).toBeNull();
  });

  it("never uses a label dated after the return", () => {
    const input = syntheticInput(80, ["AAA"], 13);
    const labels = classifyRegimes(input.indicators, 24);
    const monthly = alignRegimes(labels, input.instruments.rows.map((r) => r.date));

    for (const entry of monthly) {
      if (entry.source) expect(entry.source.date <= entry.date).toBe(true);
    }
  });
});

// ---------------------------------------------------------------------------
// Conditioning
// ---------------------------------------------------------------------------

describe("returnRowIndices", () => {
  it("skips rows where no instrument has a return", () => {
    const perf = computePerformanceTable(
      instrumentTable(DATES, { AAA: [1, 2, null, null, 5], BBB: [null, 2, null, null, 3] }),
      ["AAA", "BBB"],
    );
    expect(returnRowIndices(perf, ["AAA", "BBB"])).toEqual([1, 4]);
  });
});

describe("conditionOnRegimes", () => {
  // returns: -, +10%, -10%, +10%, +10%
  const table = instrumentTable(DATES, { AAA: [100, 110, 99, 108.9, 119.79] });
  const perf = computePerformanceTable(table, ["AAA"]);

  it("averages returns and drawdowns per regime", () => {
    const labels = [
      observation(DATES[0], "Low_Easy"),
      observation(DATES[1], "Low_Easy"),
      observation(DATES[2], "High_Tight"),
      observation(DATES[3], "High_Tight"),
      observation(DATES[4], "Low_Easy"),
    ];
    const result = conditionOnRegimes(labels, perf, ["AAA"]);

    expect(result.observationCount).toBe(4);
    expect(result.dropped).toEqual([]);
    expect(result.stats.map((s) => s.regime)).toEqual(["Low_Easy", "High_Tight"]);

    const [lowEasy, highTight] = result.stats;
    expect(lowEasy.count).toBe(2);
    expect(lowEasy.regimeName).toBe("Stable expansion (Risk-on)");
    expect(lowEasy.meanReturn.AAA).toBeCloseTo(0.1, 12);
    expect(lowEasy.meanDrawdown.AAA).toBeCloseTo(0, 12);

    expect(highTight.count).toBe(2);
    expect(highTight.meanReturn.AAA).toBeCloseTo(0, 12);
    expect(highTight.meanDrawdown.AAA).toBeCloseTo(-0.055, 12);
    expect(highTight.maxDrawdown.AAA).toBeCloseTo(-0.1, 12);
  });

  it("drops regimes with a single observation", () => {
    const labels = [
      observation(DATES[0], "Low_Easy"),
      observation(DATES[2], "Low_Tight"),
      observation(DATES[3], "Low_Easy"),
    ];
    const result = conditionOnRegimes(labels, perf, ["AAA"]);

    // row 1 and 3, 4 are Low_Easy; row 2 is Low_Tight
    expect(result.aligned.map((a) => a.regime)).toEqual(["Low_Easy", "Low_Tight", "Low_Easy", "Low_Easy"]);
    expect(result.stats.map((s) => s.regime)).toEqual(["Low_Easy"]);
    expect(result.stats[0].count).toBe(3);
    expect(result.dropped).toEqual(["Low_Tight"]);
    expect(result.observationCount).toBe(4);
  });

  it("excludes rows before the first label", () => {
    const result = conditionOnRegimes([observation(DATES[3], "High_Easy")], perf, ["AAA"]);

    expect(result.aligned.map((a) => a.regime)).toEqual([null, null, "High_Easy", "High_Easy"]);
    expect(result.observationCount).toBe(2);
    expect(result.stats[0].meanReturn.AAA).toBeCloseTo(0.1, 12);
  });

  it("matches a direct mean over each regime's member rows", () => {
    const input = syntheticInput(120, ["AAA", "BBB", "CCC"], 77);
    const symbols = input.instruments.instruments;
    const labels = classifyRegimes(input.indicators, 36);
    const table = computePerformanceTable(input.instruments, symbols);
    const result = conditionOnRegimes(labels, table, symbols);
    const rows = returnRowIndices(table, symbols);

    for (const stat of result.stats) {
      const members = rows.filter((_, k) => result.aligned[k].regime === stat.regime);
      expect(members).toHaveLength(stat.count);

      for (const symbol of symbols) {
        const returns = members.map((i) => table.series[symbol].returns[i]).filter((v): v is number => v !== null);
        const direct = returns.reduce((a, b) => a + b, 0) / returns.length;
        expect(stat.meanReturn[symbol]).toBeCloseTo(direct, 12);
      }
    }
  });
});
