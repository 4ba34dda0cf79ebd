/**
 * Retention Service
 * Expires stale results and deletes old jobs together with their audio.
 * Blob deletes are best-effort: a failed delete never blocks row deletion.
 */

import type { Job, JobRepository } from "../../repositories/jobRepository.js";
import type { ObjectStore } from "../external/storage.js";
import { resolveResultRef } from "../../utils/storagePaths.js";
import { errorText, truncate } from "../../utils/errorMessages.js";

export const SWEEP_PAGE_SIZE = 200;

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export interface RetentionDeps {
  jobs: JobRepository;
  storage: ObjectStore;
  pageSize?: number;
}

export interface SweepResult {
  deletedJobs: number;
  deletedObjects: number;
}

export interface RetentionPolicy {
  /** Delete jobs created more than this many days ago; 0 disables. */
  retentionDays: number;
  /** Expire ready results older than this many hours; 0 disables. */
  resultTtlHours: number;
}

export interface RetentionRun extends SweepResult {
  expiredJobs: number;
}

export function retentionCutoff(days: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

type BlobOutcome = "deleted" | "none" | "failed";

/**
 * Deletes the job's blob when its reference points into our bucket.
 * "none" means there was nothing of ours to delete.
 */
async function deleteResultBlob(storage: ObjectStore, job: Job): Promise<BlobOutcome> {
  const location = resolveResultRef(job.result_ref, storage.bucket);
  if (location?.kind !== "key") {
    return "none";
  }
  try {
    await storage.delete(location.key);
    return "deleted";
  } catch (error) {
    console.warn(`[retention] Failed to delete ${location.key} for job ${job.id}: ${truncate(errorText(error), 200)}`);
    return "failed";
  }
}

/**
 * Removes every job created before `cutoff` and the audio it produced.
 * Never touches a row with created_at >= cutoff; a second run with the same
 * cutoff deletes nothing.
 */
export async function sweepExpiredJobs(
  { jobs, storage, pageSize = SWEEP_PAGE_SIZE }: RetentionDeps,
  cutoff: Date
): Promise<SweepResult> {
  let deletedObjects = 0;
  let offset = 0;

  for (;;) {
    const page = await jobs.listBefore(cutoff, pageSize, offset);
    for (const job of page) {
      if ((await deleteResultBlob(storage, job)) === "deleted") {
        deletedObjects++;
      }
    }
    if (page.length < pageSize) {
      break;
    }
    offset += page.length;
  }

  const deletedJobs = await jobs.deleteBefore(cutoff);
  console.log(`[retention] Deleted ${deletedJobs} jobs and ${deletedObjects} objects created before ${cutoff.toISOString()}`);
  return { deletedJobs, deletedObjects };
}

/**
 * Marks ready jobs whose result is older than `olderThan` as expired and
 * deletes their audio. Expired jobs may be retried.
 * A job whose audio could not be deleted stays ready for the next run, so its
 * reference is never lost.
 */
export async function expireReadyJobs(
  { jobs, storage, pageSize = SWEEP_PAGE_SIZE }: RetentionDeps,
  olderThan: Date
): Promise<number> {
  let expired = 0;
  const retained = new Set<string>();

  for (;;) {
    // Expired rows leave the "ready" set, so each page starts from the top.
    // Retained rows are still in it and are paged past.
    const limit = pageSize + retained.size;
    const page = await jobs.listByStatus("ready", olderThan, limit);
    for (const job of page) {
      if (retained.has(job.id)) {
        continue;
      }
      if ((await deleteResultBlob(storage, job)) === "failed") {
        retained.add(job.id);
        continue;
      }
      if (await jobs.transitionStatus(job.id, ["ready"], "expired")) {
        expired++;
      }
    }
    if (page.length < limit) {
      break;
    }
  }

  if (expired > 0) {
    console.log(`[retention] Expired ${expired} results older than ${olderThan.toISOString()}`);
  }
  if (retained.size > 0) {
    console.warn(`[retention] Kept ${retained.size} ready jobs whose audio could not be deleted`);
  }
  return expired;
}

/**
 * Scheduled run: the expiry phase first, then the deletion phase.
 */
export async function runRetention(
  deps: RetentionDeps,
  { retentionDays, resultTtlHours }: RetentionPolicy,
  now: Date = new Date()
): Promise<RetentionRun> {
  const expiredJobs =
    resultTtlHours > 0 ? await expireReadyJobs(deps, new Date(now.getTime() - resultTtlHours * HOUR_MS)) : 0;

  const swept =
    retentionDays > 0
      ? await sweepExpiredJobs(deps, retentionCutoff(retentionDays, now))
      : { deletedJobs: 0, deletedObjects: 0 };

  return { expiredJobs, ...swept };
}
