/**
 * Job Service
 * Business logic for creating, reading and retrying conversion jobs.
 * Result URLs are minted on every read; only the object key is stored.
 */

import { randomUUID } from "crypto";
import type { Job, JobRepository } from "../../repositories/jobRepository.js";
import type { ObjectStore } from "../external/storage.js";
import type { TaskDispatcher } from "../external/queue/enqueueProcessJob.js";
import { detectPlatform, extractUrl } from "../../utils/platform.js";
import { StoragePaths, resolveResultRef } from "../../utils/storagePaths.js";
import { BadRequestError, ConflictError, NotFoundError } from "../../utils/errors.js";
import { canRetry, RETRYABLE_STATUSES, type JobStatus } from "./jobStateMachine.js";

/** Public shape of a job, shared by the REST endpoints and the status stream. */
export interface JobView {
  jobId: string;
  sourceUrl: string;
  platform: string;
  status: JobStatus;
  error: string | null;
  mp3Url: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface JobAccepted {
  jobId: string;
  status: JobStatus;
}

export interface JobServiceDeps {
  jobs: JobRepository;
  storage: ObjectStore;
  dispatcher: TaskDispatcher;
  resultUrlTtlSeconds: number;
  newId?: () => string;
}

export interface JobService {
  createJob(input: string): Promise<JobAccepted>;
  getJob(id: string): Promise<JobView>;
  listJobs(limit?: number): Promise<JobView[]>;
  getDownloadUrl(id: string): Promise<string>;
  retryJob(id: string): Promise<JobAccepted>;
  toView(job: Job): Promise<JobView>;
}

export function createJobService({
  jobs,
  storage,
  dispatcher,
  resultUrlTtlSeconds,
  newId = randomUUID,
}: JobServiceDeps): JobService {
  async function signResult(job: Job, filenameHint?: string): Promise<string | null> {
    const location = resolveResultRef(job.result_ref, storage.bucket);
    if (!location) {
      return null;
    }
    if (location.kind === "url") {
      return location.url;
    }
    return storage.presignRead(location.key, resultUrlTtlSeconds, filenameHint);
  }

  async function toView(job: Job): Promise<JobView> {
    return {
      jobId: job.id,
      sourceUrl: job.source_url,
      platform: job.platform,
      status: job.status,
      error: job.error,
      mp3Url: job.status === "ready" ? await signResult(job) : null,
      createdAt: job.created_at,
      updatedAt: job.updated_at,
    };
  }

  return {
    toView,

    /**
     * Validates the submitted text, stores a queued job and dispatches it.
     * The row is committed before dispatch; a DispatchError leaves it queued.
     */
    async createJob(input) {
      if (!input.trim()) {
        throw new BadRequestError("url is required");
      }
      const sourceUrl = extractUrl(input);
      if (!sourceUrl) {
        throw new BadRequestError("no valid url found");
      }
      const platform = detectPlatform(sourceUrl);
      if (!platform) {
        throw new BadRequestError("unsupported platform");
      }

      const job = await jobs.create({ id: newId(), source_url: sourceUrl, platform });
      console.log(`[jobs] Created job ${job.id} (${platform}) for ${sourceUrl}`);

      await dispatcher.enqueue(job.id, job.source_url);
      return { jobId: job.id, status: job.status };
    },

    async getJob(id) {
      return toView(await jobs.get(id));
    },

    async listJobs(limit) {
      const rows = await jobs.list(limit);
      return Promise.all(rows.map(toView));
    },

    /**
     * Signed URL with an attachment filename hint. Conflict unless ready.
     */
    async getDownloadUrl(id) {
      const job = await jobs.get(id);
      if (job.status !== "ready") {
        throw new ConflictError("job not ready");
      }
      const url = await signResult(job, StoragePaths.downloadFilename(job.id));
      if (!url) {
        throw new NotFoundError("Job audio", id);
      }
      return url;
    },

    /**
     * Re-enters queued from failed or expired and dispatches a fresh task.
     * Any other status is a conflict and the job is left untouched.
     */
    async retryJob(id) {
      const job = await jobs.get(id);
      if (!canRetry(job.status)) {
        throw new ConflictError("job not retryable");
      }

      // Guarded write: a concurrent retry or a worker that picked the job up wins.
      if (!(await jobs.transitionStatus(job.id, RETRYABLE_STATUSES, "queued"))) {
        throw new ConflictError("job not retryable");
      }
      console.log(`[jobs] Retrying job ${job.id} (was ${job.status})`);

      await dispatcher.enqueue(job.id, job.source_url);
      return { jobId: job.id, status: "queued" };
    },
  };
}
