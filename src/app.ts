import { Hono } from "hono";
import { globalErrorHandler, notFoundHandler } from "./middleware/error-handler.ts";
import { createHealthRoutes } from "./routes/health.ts";
import { createRegimeRoutes, type ResultsSource } from "./routes/regimes.ts";

export interface AppOptions {
  loadResults: ResultsSource;
}

export function createApp({ loadResults }: AppOptions): Hono {
  const app = new Hono();

  // Health check (public)
  app.route("/health", createHealthRoutes(loadResults));

  // Backtest results
  app.route("/api/v1/regimes", createRegimeRoutes(loadResults));

  app.onError(globalErrorHandler);
  app.notFound(notFoundHandler);

  return app;
}
