/**
 * Process Job Orchestrator
 * Drives one job through resolve → download → transcode → upload → ready.
 * Every status write lands before the next stage starts. Any failure is
 * persisted as `failed` with a bounded message before it is rethrown, so the
 * dispatcher can decide between another attempt and giving up.
 */

import { mkdir, rm } from "fs/promises";
import path from "path";
import type { Job, JobRepository } from "../../repositories/jobRepository.js";
import type { MediaResolver } from "../../services/external/mediaResolver.js";
import type { Downloader } from "../../services/business/downloadService.js";
import type { Transcoder } from "../../services/external/ffmpeg.js";
import type { ObjectStore } from "../../services/external/storage.js";
import type { ProcessJobTask } from "../../services/external/queue/enqueueProcessJob.js";
import type { JobStatus } from "../../services/business/jobStateMachine.js";
import { StoragePaths } from "../../utils/storagePaths.js";
import { errorText, formatFailureMessage } from "../../utils/errorMessages.js";
import { NotFoundError, PipelineError, UploadError } from "../../utils/errors.js";

export interface PipelineDeps {
  jobs: JobRepository;
  resolve: MediaResolver;
  download: Downloader;
  transcoder: Transcoder;
  storage: ObjectStore;
  /** Parent of the per-job scratch directories. */
  workRoot: string;
}

export interface PipelineRunOptions {
  /** Job deadline. Its reason becomes the failure when it fires. */
  signal?: AbortSignal;
}

export type PipelineOutcome =
  | { outcome: "ready"; resultRef: string }
  | { outcome: "skipped"; status: JobStatus };

async function loadJob(jobs: JobRepository, jobId: string): Promise<Job> {
  try {
    return await jobs.get(jobId);
  } catch (error) {
    if (error instanceof NotFoundError) {
      throw new PipelineError("lookup", `job ${jobId} no longer exists`, false);
    }
    throw error;
  }
}

async function recordFailure(jobs: JobRepository, jobId: string, cause: unknown): Promise<void> {
  const message = formatFailureMessage(cause);
  try {
    await jobs.updateStatus(jobId, "failed", message);
    console.error(`[pipeline] Job ${jobId} failed: ${message}`);
  } catch (persistError) {
    console.error(`[pipeline] Could not record failure for job ${jobId}:`, persistError);
  }
}

/**
 * Processes one delivered task. Redelivery of a job that already reached
 * ready or expired is acknowledged without doing any work.
 */
export async function processJobOrchestrator(
  task: ProcessJobTask,
  deps: PipelineDeps,
  { signal }: PipelineRunOptions = {}
): Promise<PipelineOutcome> {
  const { jobs, resolve, download, transcoder, storage, workRoot } = deps;
  const { jobId, sourceUrl } = task;

  const job = await loadJob(jobs, jobId);
  if (job.status === "ready" || job.status === "expired") {
    console.log(`[pipeline] Job ${jobId} already ${job.status}, skipping redelivered task`);
    return { outcome: "skipped", status: job.status };
  }

  console.log(`[pipeline] Job ${jobId} start url=${sourceUrl}`);
  const workDir = path.join(workRoot, jobId);

  try {
    await mkdir(workDir, { recursive: true });

    // 1. Resolve the share link to a direct media URL
    await jobs.updateStatus(jobId, "downloading");
    const media = await resolve(sourceUrl, signal);
    console.log(`[pipeline] Job ${jobId} resolved platform=${media.platform || job.platform} kind=${media.kind}`);

    // 2. Fetch the media into the scratch workspace
    const inputPath = path.join(workDir, `${jobId}${media.kind === "audio" ? ".m4a" : ".mp4"}`);
    await download(media.mediaUrl, inputPath, { referer: sourceUrl, signal });

    // 3. Transcode to MP3
    await jobs.updateStatus(jobId, "transcoding");
    const mp3Path = await transcoder.transcode(inputPath, path.join(workDir, `${jobId}.mp3`), signal);

    // 4. Upload under a deterministic key; redelivery overwrites the same object
    const key = StoragePaths.jobAudio(jobId);
    try {
      await storage.put(key, mp3Path, "audio/mpeg", signal);
    } catch (error) {
      throw signal?.aborted ? error : new UploadError(errorText(error));
    }

    await jobs.updateStatus(jobId, "ready", null, key);
    console.log(`[pipeline] Job ${jobId} done key=${key}`);
    return { outcome: "ready", resultRef: key };
  } catch (error) {
    const cause: unknown = signal?.aborted ? signal.reason : error;
    await recordFailure(jobs, jobId, cause);
    throw cause;
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}
