import { Hono } from "hono";
import { errorMessage } from "../lib/errors.ts";
import type { ResultsSource } from "./regimes.ts";

/** Track server start time for uptime calculation */
const serverStartTime = Date.now();

/**
 * GET /health - Service health with a check that stored results are readable
 *
 * Returns:
 * - status: "ok", or "degraded" when the results file exists but fails validation
 * - uptime: milliseconds since server start
 * - results: { loaded: boolean, latestDate?: string, error?: string }
 * - timestamp: current ISO timestamp
 */
export function createHealthRoutes(loadResults: ResultsSource): Hono {
  const healthRoutes = new Hono();

  healthRoutes.get("/", (c) => {
    let loaded = false;
    let latestDate: string | undefined;
    let loadError: string | undefined;

    try {
      const result = loadResults();
      loaded = result !== null;
      latestDate = result?.monthly.history.at(-1)?.date;
    } catch (err) {
      loadError = errorMessage(err);
    }

    return c.json({
      status: loadError ? "degraded" : "ok",
      uptime: Date.now() - serverStartTime,
      results: {
        loaded,
        ...(latestDate && { latestDate }),
        ...(loadError && { error: loadError }),
      },
      timestamp: new Date().toISOString(),
    });
  });

  return healthRoutes;
}
