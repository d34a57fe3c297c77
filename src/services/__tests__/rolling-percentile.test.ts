/**
 * Rolling Percentile Tests
 *
 * Trailing-window percentile over sparse series: eligibility threshold,
 * equivalence with a direct percentile of the window, and no look-ahead.
 */

import { describe, it, expect } from "vitest";
import { ConfigError } from "../../lib/errors.ts";
import { percentile, type Maybe } from "../../lib/math-utils.ts";
import { minimumSamples, percentileAt, rollingPercentile } from "../rolling-percentile.ts";
import { seededRandom } from "./helpers.ts";

function sparseSeries(length: number, seed: number): Maybe[] {
  const rand = seededRandom(seed);
  return Array.from({ length }, () => {
    const v = rand();
    return v < 0.2 ? null : Math.round(v * 1000) / 100;
  });
}

describe("minimumSamples", () => {
  it("requires half the window, at least one", () => {
    expect(minimumSamples(60)).toBe(30);
    expect(minimumSamples(5)).toBe(2);
    expect(minimumSamples(1)).toBe(1);
  });
});

describe("rollingPercentile", () => {
  it("computes the trailing median once the window is half full", () => {
    expect(rollingPercentile([1, 2, 3, 4], 4, 50)).toEqual([null, 1.5, 2, 2.5]);
  });

  it("excludes missing values from the window", () => {
    expect(rollingPercentile([5, null, 1, null, 3], 4, 50)).toEqual([null, null, 3, 3, 2]);
  });

  it("yields each defined value itself with a window of one", () => {
    expect(rollingPercentile([4, null, 7], 1, 50)).toEqual([4, null, 7]);
  });

  it("matches a direct percentile of the trailing window at every position", () => {
    const series = sparseSeries(120, 7);
    const window = 24;
    const rolled = rollingPercentile(series, window, 50);

    series.forEach((_, t) => {
      const trailing = series
        .slice(Math.max(0, t - window + 1), t + 1)
        .filter((v): v is number => v !== null);
      if (trailing.length < minimumSamples(window)) {
        expect(rolled[t]).toBeNull();
      } else {
        expect(rolled[t]).toBeCloseTo(percentile(trailing, 0.5), 12);
      }
    });
  });

  it("never reads values after the position", () => {
    const series = sparseSeries(60, 11);
    const altered = [...series.slice(0, 40), ...series.slice(40).map((v) => (v === null ? 99 : v * 10))];

    const original = rollingPercentile(series, 12, 50);
    const changed = rollingPercentile(altered, 12, 50);
    expect(changed.slice(0, 40)).toEqual(original.slice(0, 40));
  });

  it("supports percentiles other than the median", () => {
    expect(rollingPercentile([1, 2, 3, 4, 5], 5, 25)).toEqual([null, 1.25, 1.5, 1.75, 2]);
  });

  it("rejects non-positive windows and out-of-range percentiles", () => {
    expect(() => rollingPercentile([1, 2], 0, 50)).toThrow(ConfigError);
    expect(() => rollingPercentile([1, 2], 2.5, 50)).toThrow(ConfigError);
    expect(() => rollingPercentile([1, 2], 2, 101)).toThrow(ConfigError);
  });
});

describe("percentileAt", () => {
  it("agrees with the rolling series at every index", () => {
    const series = sparseSeries(50, 3);
    const rolled = rollingPercentile(series, 10, 50);
    series.forEach((_, i) => {
      expect(percentileAt(series, i, 10, 50)).toEqual(rolled[i]);
    });
  });

  it("returns null outside the series", () => {
    expect(percentileAt([1, 2, 3], 3, 2, 50)).toBeNull();
    expect(percentileAt([1, 2, 3], -1, 2, 50)).toBeNull();
  });
});
