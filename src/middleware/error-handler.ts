/**
 * Global Error Handler Middleware
 *
 * Catches unhandled errors in any route and returns a consistent
 * structured JSON response, logging each one through the structured logger.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import { AppError, ErrorCodes } from "../lib/errors.ts";
import { logger } from "../services/structured-logger.ts";

// ---------------------------------------------------------------------------
// Error response type
// ---------------------------------------------------------------------------

export interface StructuredError {
  error: string;
  code: string;
  status: ContentfulStatusCode;
  details?: unknown;
}

// ---------------------------------------------------------------------------
// Error mapper: known error types → structured response
// ---------------------------------------------------------------------------

export function mapErrorToResponse(err: unknown): StructuredError {
  if (err instanceof AppError) {
    return {
      error: err.message,
      code: err.errorCode,
      status: err.statusCode,
      ...(err.details !== undefined && { details: err.details }),
    };
  }

  if (err instanceof ZodError) {
    return {
      error: "Validation failed",
      code: "validation_failed",
      status: 400,
      details: err.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    };
  }

  return {
    error: "Internal server error",
    code: ErrorCodes.INTERNAL_ERROR.code,
    status: ErrorCodes.INTERNAL_ERROR.status,
  };
}

// ---------------------------------------------------------------------------
// Hono onError handler
// ---------------------------------------------------------------------------

/**
 * Global error handler for Hono's app.onError().
 *
 * Usage:
 *   app.onError(globalErrorHandler);
 */
export function globalErrorHandler(err: Error, c: Context): Response {
  const structured = mapErrorToResponse(err);

  if (structured.status >= 500) {
    logger.error("api", `${c.req.method} ${c.req.path} failed`, err);
  } else {
    logger.warn("api", `${c.req.method} ${c.req.path} rejected`, {
      code: structured.code,
      error: structured.error,
    });
  }

  return c.json(structured, structured.status);
}

// ---------------------------------------------------------------------------
// 404 Not Found handler
// ---------------------------------------------------------------------------

/**
 * Global 404 handler for Hono's app.notFound().
 *
 * Usage:
 *   app.notFound(notFoundHandler);
 */
export function notFoundHandler(c: Context): Response {
  return c.json(
    {
      error: `Route ${c.req.method} ${c.req.path} not found`,
      code: "not_found",
      status: 404,
    },
    404
  );
}
