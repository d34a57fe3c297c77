/**
 * Standardized Error Handling
 *
 * Error classes raised by the backtest engine and the consistent error
 * response format used across all API routes.
 * Format: { error: string, code: string, details?: unknown }
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";

export interface ApiError {
  error: string;
  code: string;
  details?: unknown;
}

/**
 * Standard error codes mapped to HTTP status codes
 */
export const ErrorCodes = {
  // 400 Bad Request
  INVALID_CONFIG: { status: 400, code: "invalid_config" },
  INVALID_CADENCE: { status: 400, code: "invalid_cadence" },

  // 404 Not Found
  RESULTS_NOT_FOUND: { status: 404, code: "results_not_found" },
  CURRENT_REGIME_UNAVAILABLE: { status: 404, code: "current_regime_unavailable" },

  // 422 Unprocessable Entity
  PRECONDITION_FAILED: { status: 422, code: "precondition_failed" },
  INVALID_RESULTS_FILE: { status: 422, code: "invalid_results_file" },

  // 500 Internal Server Error
  INTERNAL_ERROR: { status: 500, code: "internal_error" },
} as const satisfies Record<string, { status: ContentfulStatusCode; code: string }>;

export type ErrorCodeKey = keyof typeof ErrorCodes;

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class AppError extends Error {
  public readonly statusCode: ContentfulStatusCode;
  public readonly errorCode: string;
  public readonly details?: unknown;

  constructor(errorCode: ErrorCodeKey, message: string, details?: unknown) {
    super(message);
    this.name = "AppError";
    this.statusCode = ErrorCodes[errorCode].status;
    this.errorCode = ErrorCodes[errorCode].code;
    this.details = details;
  }
}

/** Closed ISO date interval covered by a table. */
export interface DateRange {
  start: string;
  end: string;
}

/** Expected-versus-actual description attached to a precondition failure. */
export interface PreconditionDetails {
  expected: string;
  actual: string;
  indicatorRange?: DateRange | null;
  instrumentRange?: DateRange | null;
  missingColumns?: string[];
  availableColumns?: string[];
}

/**
 * Input tables cannot support a backtest (empty, missing columns, no
 * overlapping history). Always fatal; never replaced by defaults.
 */
export class PreconditionError extends AppError {
  public override readonly details: PreconditionDetails;

  constructor(message: string, details: PreconditionDetails) {
    super("PRECONDITION_FAILED", message, details);
    this.name = "PreconditionError";
    this.details = details;
  }
}

/**
 * A configuration value is outside the range the engine accepts.
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super("INVALID_CONFIG", message, details);
    this.name = "ConfigError";
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Extract a printable message from anything that was thrown.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Create a standardized API error response
 */
export function apiError(
  c: Context,
  errorCode: ErrorCodeKey,
  details?: unknown
) {
  const { status, code } = ErrorCodes[errorCode];
  const response: ApiError = {
    error: code,
    code,
    ...(details !== undefined && { details }),
  };
  return c.json(response, status);
}
