/**
 * Structured Logging
 *
 * JSON-or-pretty logging with context propagation for backtest runs.
 * Replaces ad-hoc console.log calls with structured events that can be
 * filtered and inspected.
 *
 * Features:
 * - JSON structured logs in production, readable lines in development
 * - Log levels: DEBUG, INFO, WARN, ERROR, FATAL
 * - Context propagation (runId, cadence) onto every entry
 * - Backtest run lifecycle logging
 * - Ring buffer for recent logs (in-memory access)
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

export interface LogContext {
  /** Backtest run ID */
  runId?: string;
  /** Cadence being processed (monthly, quarterly) */
  cadence?: string;
}

export interface StructuredLogEntry extends LogContext {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Service/module that generated the log */
  service: string;
  message: string;
  /** Additional structured data */
  data?: Record<string, unknown>;
  error?: {
    message: string;
    name: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** Minimum log level to output (INFO in production, WARN under test, DEBUG otherwise) */
  minLevel: LogLevel;
  /** Whether to output as JSON */
  jsonOutput: boolean;
  includeStackTraces: boolean;
  /** Maximum number of logs to keep in memory ring buffer */
  ringBufferSize: number;
}

export interface LoggerStats {
  totalLogs: number;
  logsByLevel: Record<LogLevel, number>;
  errorsLogged: number;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";
const requestedLevel = process.env.LOG_LEVEL;

const config: LoggerConfig = {
  minLevel: isLogLevel(requestedLevel)
    ? requestedLevel
    : isProduction
      ? "INFO"
      : isTest
        ? "WARN"
        : "DEBUG",
  jsonOutput: isProduction,
  includeStackTraces: !isProduction,
  ringBufferSize: 500,
};

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

const ringBuffer: StructuredLogEntry[] = [];

let stats: LoggerStats = {
  totalLogs: 0,
  logsByLevel: { DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
  errorsLogged: 0,
};

let currentContext: LogContext = {};

// ---------------------------------------------------------------------------
// Context Management
// ---------------------------------------------------------------------------

/**
 * Set the current logging context. All subsequent logs will include these fields.
 */
export function setContext(ctx: LogContext): void {
  currentContext = { ...currentContext, ...ctx };
}

export function clearContext(): void {
  currentContext = {};
}

/**
 * Execute a function with a specific logging context.
 * Context is restored after the function completes, including on throw.
 */
export function withContext<T>(ctx: LogContext, fn: () => T): T {
  const previousContext = { ...currentContext };
  setContext(ctx);
  try {
    return fn();
  } finally {
    currentContext = previousContext;
  }
}

// ---------------------------------------------------------------------------
// Core Logging
// ---------------------------------------------------------------------------

function log(
  level: LogLevel,
  service: string,
  message: string,
  data?: Record<string, unknown>,
  error?: Error,
): void {
  // Ring buffer keeps everything so recent DEBUG events stay inspectable
  const entry: StructuredLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    service,
    message,
    ...currentContext,
    data,
  };

  if (error) {
    entry.error = {
      message: error.message,
      name: error.name,
      stack: config.includeStackTraces ? error.stack : undefined,
    };
    stats.errorsLogged++;
  }

  stats.totalLogs++;
  stats.logsByLevel[level]++;

  ringBuffer.push(entry);
  if (ringBuffer.length > config.ringBufferSize) {
    ringBuffer.splice(0, ringBuffer.length - config.ringBufferSize);
  }

  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[config.minLevel]) {
    return;
  }

  let output: string;
  if (config.jsonOutput) {
    output = JSON.stringify(entry);
  } else {
    const prefix = `[${level}][${service}]`;
    const contextStr = currentContext.runId
      ? ` (run:${currentContext.runId}${currentContext.cadence ? `/${currentContext.cadence}` : ""})`
      : "";
    const dataStr = data ? ` ${JSON.stringify(data)}` : "";
    const errorStr = error ? ` ERROR: ${error.message}` : "";
    output = `${prefix}${contextStr} ${message}${dataStr}${errorStr}`;
  }

  if (level === "ERROR" || level === "FATAL") {
    console.error(output);
  } else if (level === "WARN") {
    console.warn(output);
  } else {
    console.log(output);
  }
}

// ---------------------------------------------------------------------------
// Log Level Methods
// ---------------------------------------------------------------------------

export const logger = {
  debug(service: string, message: string, data?: Record<string, unknown>): void {
    log("DEBUG", service, message, data);
  },

  info(service: string, message: string, data?: Record<string, unknown>): void {
    log("INFO", service, message, data);
  },

  warn(service: string, message: string, data?: Record<string, unknown>): void {
    log("WARN", service, message, data);
  },

  error(service: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    log("ERROR", service, message, data, error);
  },

  fatal(service: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    log("FATAL", service, message, data, error);
  },
};

// ---------------------------------------------------------------------------
// Backtest Lifecycle Logging
// ---------------------------------------------------------------------------

export function logBacktestStart(
  runId: string,
  details: { windowLength: number; rankingBreadth: number; instruments: number; indicatorRows: number; instrumentRows: number },
): void {
  setContext({ runId });
  logger.info("regime-backtest", "Backtest started", { runId, ...details });
}

/**
 * Log the outcome of one cadence pass (observation counts per regime).
 */
export function logCadenceSummary(
  cadence: string,
  summary: { windowLength: number; observations: number; regimes: Record<string, number>; dropped: string[] },
): void {
  logger.info("regime-backtest", `Cadence ${cadence} conditioned`, { cadence, ...summary });
  if (summary.dropped.length > 0) {
    logger.debug("regime-backtest", `Regimes below minimum observations at ${cadence}`, {
      cadence,
      dropped: summary.dropped,
    });
  }
}

export function logBacktestComplete(runId: string, durationMs: number, currentRegime: string | null): void {
  logger.info("regime-backtest", "Backtest completed", { runId, durationMs, currentRegime });
  clearContext();
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Time a synchronous operation and log the result at DEBUG. Failures are
 * rethrown for the caller to report.
 */
export function timeOperation<T>(
  service: string,
  operationName: string,
  fn: () => T,
): { result: T; durationMs: number } {
  const startMs = Date.now();

  try {
    const result = fn();
    const durationMs = Date.now() - startMs;
    logger.debug(service, `${operationName} completed in ${durationMs}ms`, {
      operation: operationName,
      durationMs,
    });
    return { result, durationMs };
  } catch (err) {
    const durationMs = Date.now() - startMs;
    logger.debug(service, `${operationName} failed after ${durationMs}ms`, {
      operation: operationName,
      durationMs,
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Log Access & Querying
// ---------------------------------------------------------------------------

/**
 * Get recent logs from the ring buffer.
 */
export function getRecentLogs(filters?: {
  level?: LogLevel;
  service?: string;
  runId?: string;
  limit?: number;
}): StructuredLogEntry[] {
  let filtered = [...ringBuffer];

  if (filters?.level) {
    const minPriority = LOG_LEVEL_PRIORITY[filters.level];
    filtered = filtered.filter(
      (l) => LOG_LEVEL_PRIORITY[l.level] >= minPriority,
    );
  }
  if (filters?.service) {
    filtered = filtered.filter((l) => l.service === filters.service);
  }
  if (filters?.runId) {
    filtered = filtered.filter((l) => l.runId === filters.runId);
  }

  const limit = filters?.limit ?? 50;
  return filtered.slice(-limit);
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function configureLogger(updates: Partial<LoggerConfig>): LoggerConfig {
  Object.assign(config, updates);
  return { ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...config };
}

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

export function getLoggerStats(): LoggerStats {
  return { ...stats, logsByLevel: { ...stats.logsByLevel } };
}

/**
 * Reset logger statistics, ring buffer and context.
 */
export function resetLoggerStats(): void {
  stats = {
    totalLogs: 0,
    logsByLevel: { DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
    errorsLogged: 0,
  };
  ringBuffer.length = 0;
  clearContext();
}
