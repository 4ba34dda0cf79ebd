/**
 * Custom Application Errors
 * Domain-specific error classes. Every HTTP-facing error carries a
 * machine-readable `kind` that the error handler echoes to clients.
 */

export type ErrorKind =
  | "validation"
  | "unauthorized"
  | "not_found"
  | "conflict"
  | "rate_limited"
  | "persistence"
  | "dispatch_failed"
  | "internal";

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public kind: ErrorKind = "internal"
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with id '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404, "not_found");
  }
}

/**
 * Bad request error (400). Raised before any job is created.
 */
export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400, "validation");
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "unauthorized") {
    super(message, 401, "unauthorized");
  }
}

/**
 * Action not valid for the job's current state (409).
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "conflict");
  }
}

/**
 * Admission rejected by the rate limiter (429).
 */
export class RateLimitError extends AppError {
  constructor(public retryAfterSeconds: number) {
    super("rate limit exceeded", 429, "rate_limited");
  }
}

/**
 * Job record store unreachable or rejected the query (503).
 */
export class PersistenceError extends AppError {
  constructor(operation: string, detail: string) {
    super(`Failed to ${operation}: ${detail}`, 503, "persistence");
  }
}

/**
 * Task broker unreachable (503). The job row is already committed.
 */
export class DispatchError extends AppError {
  constructor(jobId: string, detail: string) {
    super(`Failed to enqueue job ${jobId}: ${detail}`, 503, "dispatch_failed");
  }
}

export type PipelineStage = "lookup" | "resolve" | "download" | "transcode" | "upload";

/**
 * Failure raised inside the worker pipeline.
 * `retryable` decides whether the dispatcher may schedule another attempt.
 */
export class PipelineError extends Error {
  constructor(
    public stage: PipelineStage,
    message: string,
    public retryable: boolean
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** Resolution service returned nothing usable. Never retried. */
export class ResolutionError extends PipelineError {
  constructor(message: string) {
    super("resolve", message, false);
  }
}

export class DownloadError extends PipelineError {
  constructor(message: string, retryable: boolean) {
    super("download", message, retryable);
  }
}

export class TranscodeError extends PipelineError {
  constructor(message: string) {
    super("transcode", message, true);
  }
}

export class UploadError extends PipelineError {
  constructor(message: string) {
    super("upload", message, true);
  }
}

/**
 * Raised as the abort reason when a job exceeds its deadline.
 * Retryable: the dispatcher's attempt budget decides whether it runs again.
 */
export class JobTimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`job timed out after ${Math.round(timeoutMs / 1000)}s`);
    this.name = "JobTimeoutError";
  }
}
