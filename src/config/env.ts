import { z } from "zod";
import { DEFAULT_RANKING_BREADTH, DEFAULT_WINDOW_MONTHS } from "./constants.ts";

const envSchema = z.object({
  // Backtest parameters (overridable per run from the CLI)
  REGIME_WINDOW_MONTHS: z.coerce.number().int().min(1).default(DEFAULT_WINDOW_MONTHS),
  RANKING_BREADTH: z.coerce.number().int().min(1).default(DEFAULT_RANKING_BREADTH),

  // Input CSVs and result files
  DATA_DIR: z.string().default("data"),
  OUTPUT_DIR: z.string().default("outputs"),

  PORT: z.coerce.number().default(3000),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Overrides the logger's minimum level
  LOG_LEVEL: z.enum(["DEBUG", "INFO", "WARN", "ERROR", "FATAL"]).optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }

  return result.data;
}

export const env = loadEnv();
