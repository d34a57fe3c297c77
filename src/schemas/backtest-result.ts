/**
 * Backtest Result Schemas
 *
 * Zod schemas for the backtest configuration and the serialised result
 * consumed by the results API and any report built on it. Every number is
 * finite or null so the result survives a JSON round trip unchanged.
 */

import { z } from "zod";
import { REGIME_CODES } from "../services/regime-classifier.ts";
import { CADENCES } from "../services/regime-types.ts";

const maybeNumber = z.number().finite().nullable();
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected an ISO date (YYYY-MM-DD)");

export const regimeCodeSchema = z.enum(REGIME_CODES);
export const stressClassSchema = z.enum(["Low", "High"]);
export const creditClassSchema = z.enum(["Easy", "Tight"]);
export const cadenceSchema = z.enum(CADENCES);

/**
 * Core configuration. Validated before every run.
 */
export const regimeBacktestConfigSchema = z.object({
  windowLength: z.number().int().min(1, "Window length must be at least 1 observation"),
  rankingBreadth: z.number().int().min(1, "Ranking breadth must be at least 1"),
  instruments: z.array(z.string().min(1)).min(1, "At least one instrument is required"),
});

const instrumentStatMap = z.record(z.string(), maybeNumber);

export const conditionalStatSchema = z.object({
  regime: regimeCodeSchema,
  regimeName: z.string(),
  count: z.number().int().min(2),
  meanReturn: instrumentStatMap,
  meanDrawdown: instrumentStatMap,
  maxDrawdown: instrumentStatMap,
});

export const regimeRankingSchema = z.object({
  regime: regimeCodeSchema,
  favoritesByReturn: z.array(z.string()),
  unfavoritesByReturn: z.array(z.string()),
  favoritesByDrawdown: z.array(z.string()),
  unfavoritesByDrawdown: z.array(z.string()),
});

export const regimeHistoryEntrySchema = z.object({
  date: isoDate,
  /** Indicator date the label was carried forward from */
  labelDate: isoDate.nullable(),
  stressHorizon: maybeNumber,
  creditStress: maybeNumber,
  stressThreshold: maybeNumber,
  creditThreshold: maybeNumber,
  stressClass: stressClassSchema.nullable(),
  creditClass: creditClassSchema.nullable(),
  regime: regimeCodeSchema.nullable(),
  regimeName: z.string().nullable(),
});

export const cadenceResultSchema = z.object({
  cadence: cadenceSchema,
  windowLength: z.number().int().min(1),
  observationCount: z.number().int().min(0),
  stats: z.array(conditionalStatSchema),
  rankings: z.array(regimeRankingSchema),
  history: z.array(regimeHistoryEntrySchema),
});

export const currentRegimeSchema = z.object({
  date: isoDate,
  stressHorizon: z.number().finite(),
  creditStress: z.number().finite(),
  stressThreshold: z.number().finite(),
  creditThreshold: z.number().finite(),
  stressClass: stressClassSchema,
  creditClass: creditClassSchema,
  regime: regimeCodeSchema,
  regimeName: z.string(),
});

export const backtestResultSchema = z.object({
  config: z.object({
    windowLength: z.number().int().min(1),
    coarseWindowLength: z.number().int().min(1),
    rankingBreadth: z.number().int().min(1),
    instruments: z.array(z.string()),
  }),
  monthly: cadenceResultSchema,
  quarterly: cadenceResultSchema,
  current: currentRegimeSchema.nullable(),
});

export type RegimeHistoryEntry = z.infer<typeof regimeHistoryEntrySchema>;
export type CadenceResult = z.infer<typeof cadenceResultSchema>;
export type BacktestResult = z.infer<typeof backtestResultSchema>;
