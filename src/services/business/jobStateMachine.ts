/**
 * Job State Machine
 *
 *   queued → downloading → transcoding → ready
 *   queued | downloading | transcoding → failed
 *   failed | expired → queued            (explicit retry only)
 *   ready → expired                      (retention decision only)
 *
 * Redelivered tasks may rewrite an intermediate status (e.g. transcoding →
 * downloading, failed → downloading); those writes are last-write-wins and are
 * made by the pipeline, not validated here.
 */

export const JOB_STATUSES = ["queued", "downloading", "transcoding", "ready", "failed", "expired"] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ["downloading", "failed"],
  downloading: ["transcoding", "failed"],
  transcoding: ["ready", "failed"],
  ready: ["expired"],
  failed: ["queued"],
  expired: ["queued"],
};

const TERMINAL: ReadonlySet<JobStatus> = new Set(["ready", "failed", "expired"]);

/** Terminal statuses end a status stream; everything else is active. */
export function isTerminal(status: JobStatus): boolean {
  return TERMINAL.has(status);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Retry is only accepted from failed or expired, never for a job in flight. */
export function canRetry(status: JobStatus): boolean {
  return canTransition(status, "queued");
}

/** Statuses an explicit retry may start from. */
export const RETRYABLE_STATUSES: readonly JobStatus[] = JOB_STATUSES.filter(canRetry);

export interface StatusFields {
  error: string | null;
  resultRef: string | null;
}

/**
 * Normalises the optional fields written with a status so that a result
 * reference exists only on ready jobs and an error only on failed ones.
 */
export function statusFields(status: JobStatus, error?: string | null, resultRef?: string | null): StatusFields {
  if (status === "ready") {
    if (typeof resultRef !== "string" || resultRef.trim() === "") {
      throw new Error("A ready job requires a result reference");
    }
    return { error: null, resultRef };
  }
  if (status === "failed") {
    const message = typeof error === "string" && error.trim() !== "" ? error : "unknown error";
    return { error: message, resultRef: null };
  }
  return { error: null, resultRef: null };
}
