/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 * Every response carries a machine-readable `kind`.
 */

import type { ErrorRequestHandler } from "express";
import { AppError, RateLimitError } from "../utils/errors.js";

interface ErrorBody {
  error: string;
  kind: string;
  retryAfter?: number;
  stack?: string;
}

/** body-parser rejects malformed JSON with a 400 SyntaxError. */
function isMalformedJson(error: unknown): boolean {
  return error instanceof SyntaxError && "status" in error && error.status === 400;
}

/**
 * Global error handler middleware.
 * MUST be registered last in middleware chain.
 */
export function createErrorHandler({ exposeStack }: { exposeStack: boolean }): ErrorRequestHandler {
  return (error: unknown, req, res, _next) => {
    let statusCode = 500;
    let body: ErrorBody = { error: "Internal server error", kind: "internal" };

    if (error instanceof AppError) {
      statusCode = error.statusCode;
      body = { error: error.message, kind: error.kind };
    } else if (isMalformedJson(error)) {
      statusCode = 400;
      body = { error: "invalid json", kind: "validation" };
    }

    if (error instanceof RateLimitError) {
      body.retryAfter = error.retryAfterSeconds;
      res.setHeader("Retry-After", String(error.retryAfterSeconds));
    }

    if (statusCode >= 500) {
      console.error(`[error] ${statusCode} ${req.method} ${req.path}`, error);
    } else {
      console.warn(`[error] ${statusCode} ${req.method} ${req.path} - ${body.error}`);
    }

    if (exposeStack && statusCode >= 500 && error instanceof Error) {
      body.stack = error.stack;
    }

    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(statusCode).json(body);
  };
}
