import { serve } from "@hono/node-server";
import { createApp } from "./app.ts";
import { env } from "./config/env.ts";
import { loadBacktestResult } from "./services/results-store.ts";
import { logger } from "./services/structured-logger.ts";

// Results are re-read per request so a fresh CLI run shows up without a restart
const app = createApp({ loadResults: () => loadBacktestResult(env.OUTPUT_DIR) });

serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  (info) => {
    logger.info("server", `Regime results API listening on port ${info.port}`, {
      outputDir: env.OUTPUT_DIR,
    });
  }
);

export default app;
