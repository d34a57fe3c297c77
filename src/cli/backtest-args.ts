/**
 * Argument parsing for the run-backtest command.
 *
 * Flags accept both "--flag value" and "--flag=value". Anything not given on
 * the command line falls back to the validated environment.
 */

import type { Env } from "../config/env.ts";
import { ConfigError } from "../lib/errors.ts";

export interface BacktestArgs {
  windowLength: number;
  rankingBreadth: number;
  dataDir: string;
  outputDir: string;
  fromDaily: boolean;
  /** Explicit instrument list; null means every column of the instrument table */
  instruments: string[] | null;
  help: boolean;
}

export const USAGE = `Usage: npm run backtest -- [options]

Options:
  --window <months>       Rolling window for the monthly thresholds
  --breadth <n>           Favourite/unfavourite list length per regime
  --data-dir <dir>        Directory holding the input CSVs
  --output-dir <dir>      Directory for backtest_results.json and the history CSV
  --instruments <a,b,..>  Instruments to condition on (default: all columns)
  --daily                 Read the daily CSVs and resample them to month ends
  --help                  Show this message`;

const VALUE_FLAGS = ["--window", "--breadth", "--data-dir", "--output-dir", "--instruments"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(flag: string): flag is ValueFlag {
  return VALUE_FLAGS.some((f) => f === flag);
}

function positiveInt(flag: string, raw: string): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || value < 1) {
    throw new ConfigError(`${flag} expects a positive integer, got "${raw}"`);
  }
  return value;
}

export function parseBacktestArgs(argv: readonly string[], env: Env): BacktestArgs {
  const args: BacktestArgs = {
    windowLength: env.REGIME_WINDOW_MONTHS,
    rankingBreadth: env.RANKING_BREADTH,
    dataDir: env.DATA_DIR,
    outputDir: env.OUTPUT_DIR,
    fromDaily: false,
    instruments: null,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;

    if (flag === "--daily") {
      args.fromDaily = true;
      continue;
    }
    if (flag === "--help" || flag === "-h") {
      args.help = true;
      continue;
    }
    if (!isValueFlag(flag)) {
      throw new ConfigError(`Unknown option ${arg}`);
    }

    let value: string | undefined;
    if (eq >= 0) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value === "") {
      throw new ConfigError(`${flag} requires a value`);
    }

    switch (flag) {
      case "--window":
        args.windowLength = positiveInt(flag, value);
        break;
      case "--breadth":
        args.rankingBreadth = positiveInt(flag, value);
        break;
      case "--data-dir":
        args.dataDir = value;
        break;
      case "--output-dir":
        args.outputDir = value;
        break;
      case "--instruments":
        args.instruments = value.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
        break;
    }
  }

  return args;
}
