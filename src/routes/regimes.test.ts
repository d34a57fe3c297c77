/**
 * Regime Results API — Integration Tests
 *
 * Drives the full app in process against an in-memory result source.
 */

import { describe, it, expect } from "vitest";
import { createApp } from "../app.ts";
import type { BacktestResult } from "../schemas/backtest-result.ts";
import { runRegimeBacktest } from "../services/regime-backtest.ts";
import { syntheticInput } from "../services/__tests__/helpers.ts";
import type { ResultsSource } from "./regimes.ts";

const SYMBOLS = ["XLB", "XLK", "XLP", "XLU"];
const result: BacktestResult = runRegimeBacktest(syntheticInput(120, SYMBOLS, 31), {
  windowLength: 36,
  rankingBreadth: 2,
  instruments: SYMBOLS,
});

async function get(loadResults: ResultsSource, path: string) {
  const app = createApp({ loadResults });
  const res = await app.request(`http://localhost${path}`);
  return { status: res.status, body: await res.json() };
}

// ─── Results ──────────────────────────────────────

describe("Regime API — results", () => {
  it("GET /api/v1/regimes returns the stored result", async () => {
    const { status, body } = await get(() => result, "/api/v1/regimes");
    expect(status).toBe(200);
    expect(body.isRealData).toBe(true);
    expect(body.config.windowLength).toBe(36);
    expect(body.monthly.history).toHaveLength(119);
  });

  it("flags a run where no period was conditioned", async () => {
    const empty: BacktestResult = {
      ...result,
      monthly: { ...result.monthly, observationCount: 0, stats: [], rankings: [] },
      quarterly: { ...result.quarterly, observationCount: 0, stats: [], rankings: [] },
    };
    const { body } = await get(() => empty, "/api/v1/regimes");
    expect(body.isRealData).toBe(false);
  });

  it("returns 404 before any backtest has been stored", async () => {
    const { status, body } = await get(() => null, "/api/v1/regimes");
    expect(status).toBe(404);
    expect(body.code).toBe("results_not_found");
  });
});

// ─── Current regime ──────────────────────────────────────

describe("Regime API — current", () => {
  it("GET /current returns the latest regime", async () => {
    const { status, body } = await get(() => result, "/api/v1/regimes/current");
    expect(status).toBe(200);
    expect(body.current).toEqual(result.current);
  });

  it("returns 404 when the history was too short for a current regime", async () => {
    const { status, body } = await get(() => ({ ...result, current: null }), "/api/v1/regimes/current");
    expect(status).toBe(404);
    expect(body.code).toBe("current_regime_unavailable");
  });
});

// ─── Per-cadence routes ──────────────────────────────────────

describe("Regime API — cadences", () => {
  it("GET /:cadence/stats returns stats and rankings", async () => {
    const { status, body } = await get(() => result, "/api/v1/regimes/quarterly/stats");
    expect(status).toBe(200);
    expect(body.cadence).toBe("quarterly");
    expect(body.windowLength).toBe(12);
    expect(body.stats).toEqual(result.quarterly.stats);
    expect(body.rankings).toEqual(result.quarterly.rankings);
    expect(body.isRealData).toBe(true);
  });

  it("GET /:cadence/history keeps the last N entries", async () => {
    const { status, body } = await get(() => result, "/api/v1/regimes/monthly/history?limit=3");
    expect(status).toBe(200);
    expect(body.total).toBe(119);
    expect(body.entries).toEqual(result.monthly.history.slice(-3));
  });

  it("GET /:cadence/history ignores a malformed limit", async () => {
    const { body } = await get(() => result, "/api/v1/regimes/monthly/history?limit=abc");
    expect(body.entries).toHaveLength(119);
  });

  it("rejects an unknown cadence", async () => {
    const { status, body } = await get(() => result, "/api/v1/regimes/weekly/stats");
    expect(status).toBe(400);
    expect(body.code).toBe("invalid_cadence");
  });
});

// ─── Health & errors ──────────────────────────────────────

describe("Health and error handling", () => {
  it("GET /health reports loaded results", async () => {
    const { status, body } = await get(() => result, "/health");
    expect(status).toBe(200);
    expect(body.status).toBe("ok");
    expect(body.results.loaded).toBe(true);
    expect(body.results.latestDate).toBe(result.monthly.history[118].date);
  });

  it("GET /health is degraded when results cannot be read", async () => {
    const { body } = await get(() => {
      throw new Error("results file is corrupt");
    }, "/health");
    expect(body.status).toBe("degraded");
    expect(body.results).toEqual({ loaded: false, error: "results file is corrupt" });
  });

  it("maps thrown errors to structured responses", async () => {
    const { status, body } = await get(() => {
      throw new Error("disk unavailable");
    }, "/api/v1/regimes");
    expect(status).toBe(500);
    expect(body).toEqual({ error: "Internal server error", code: "internal_error", status: 500 });
  });

  it("returns a structured 404 for unknown routes", async () => {
    const { status, body } = await get(() => result, "/api/v2/anything");
    expect(status).toBe(404);
    expect(body.code).toBe("not_found");
  });
});
