/**
 * Regime Backtest Routes
 *
 * Serves the stored backtest result: the regime taxonomy, per-cadence
 * conditional statistics and rankings, the aligned regime history and the
 * current regime.
 *
 * Routes:
 *   GET  /api/v1/regimes                      — Full result
 *   GET  /api/v1/regimes/current              — Current regime
 *   GET  /api/v1/regimes/:cadence/stats       — Stats + rankings for monthly | quarterly
 *   GET  /api/v1/regimes/:cadence/history     — Regime history (?limit=N keeps the last N)
 */

import { Hono } from "hono";
import { apiError } from "../lib/errors.ts";
import { parseQueryInt } from "../lib/query-params.ts";
import type { BacktestResult } from "../schemas/backtest-result.ts";
import { isCadence } from "../services/regime-types.ts";

/** Supplies the latest stored result, or null when no backtest has run. */
export type ResultsSource = () => BacktestResult | null;

/**
 * True when at least one return period was conditioned on a regime.
 * Anything else is a placeholder run worth flagging in a report.
 */
export function isRealData(result: BacktestResult): boolean {
  return result.monthly.observationCount + result.quarterly.observationCount > 0;
}

export function createRegimeRoutes(loadResults: ResultsSource): Hono {
  const routes = new Hono();

  // ---------------------------------------------------------------------------
  // GET / — Full result
  // ---------------------------------------------------------------------------

  routes.get("/", (c) => {
    const result = loadResults();
    if (!result) return apiError(c, "RESULTS_NOT_FOUND", "No backtest results have been stored yet");

    return c.json({ ...result, isRealData: isRealData(result) });
  });

  // ---------------------------------------------------------------------------
  // GET /current — Current regime
  // ---------------------------------------------------------------------------

  routes.get("/current", (c) => {
    const result = loadResults();
    if (!result) return apiError(c, "RESULTS_NOT_FOUND", "No backtest results have been stored yet");
    if (!result.current) {
      return apiError(
        c,
        "CURRENT_REGIME_UNAVAILABLE",
        "Indicator history is too short for a rolling median at the latest observation",
      );
    }

    return c.json({ current: result.current });
  });

  // ---------------------------------------------------------------------------
  // GET /:cadence/stats — Conditional statistics and rankings
  // ---------------------------------------------------------------------------

  routes.get("/:cadence/stats", (c) => {
    const cadence = c.req.param("cadence");
    if (!isCadence(cadence)) return apiError(c, "INVALID_CADENCE", `Unknown cadence "${cadence}"`);

    const result = loadResults();
    if (!result) return apiError(c, "RESULTS_NOT_FOUND", "No backtest results have been stored yet");

    const run = result[cadence];
    return c.json({
      cadence,
      windowLength: run.windowLength,
      observationCount: run.observationCount,
      isRealData: isRealData(result),
      stats: run.stats,
      rankings: run.rankings,
    });
  });

  // ---------------------------------------------------------------------------
  // GET /:cadence/history — Aligned regime history
  // ---------------------------------------------------------------------------

  routes.get("/:cadence/history", (c) => {
    const cadence = c.req.param("cadence");
    if (!isCadence(cadence)) return apiError(c, "INVALID_CADENCE", `Unknown cadence "${cadence}"`);

    const result = loadResults();
    if (!result) return apiError(c, "RESULTS_NOT_FOUND", "No backtest results have been stored yet");

    const history = result[cadence].history;
    const limit = parseQueryInt(c.req.query("limit"), history.length, 1, Math.max(1, history.length));

    return c.json({
      cadence,
      total: history.length,
      entries: history.slice(history.length - Math.min(limit, history.length)),
    });
  });

  return routes;
}
