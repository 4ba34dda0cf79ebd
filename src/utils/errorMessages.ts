/**
 * Error Message Utility
 * Bounded, stage-tagged messages for persisted job failures and log lines.
 */

import { PipelineError } from "./errors.js";

/** Persisted job errors are capped at this many characters. */
export const MAX_ERROR_LENGTH = 800;

/**
 * Truncates a message, appending "..." when it was cut.
 */
export function truncate(message: string, max: number): string {
  if (max <= 0 || message.length <= max) {
    return message;
  }
  return `${message.slice(0, max)}...`;
}

export function errorText(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

/**
 * Converts a pipeline failure into the message stored on the job row.
 * Never returns an empty string.
 */
export function formatFailureMessage(error: unknown): string {
  const text = errorText(error).trim() || "unknown error";
  const message = error instanceof PipelineError ? `${error.stage} failed: ${text}` : text;
  return truncate(message, MAX_ERROR_LENGTH);
}
