/**
 * Process Job Worker (BullMQ)
 * Consumes conversion tasks and runs them through the pipeline.
 */

import "dotenv/config";
import { Worker } from "bullmq";
import { env } from "../../config/env.js";
import { redis } from "../../config/redis.js";
import { supabase } from "../../config/supabase.js";
import { s3Client, s3PresignClient, S3_BUCKET } from "../../config/s3.js";
import { createJobRepository } from "../../repositories/jobRepository.js";
import { createMediaResolver } from "../../services/external/mediaResolver.js";
import { createTranscoder } from "../../services/external/ffmpeg.js";
import { createS3ObjectStore } from "../../services/external/storage.js";
import { downloadToFile } from "../../services/business/downloadService.js";
import { PROCESS_JOB_QUEUE, type ProcessJobTask } from "../../services/external/queue/enqueueProcessJob.js";
import { cleanupStaleWorkspaces, getWorkspaceDiskUsage } from "../../utils/cleanupTemp.js";
import { createProcessJobHandler } from "./processJobHandler.js";
import type { PipelineOutcome } from "../orchestrators/processJobOrchestrator.js";

const timeoutMs = env.JOB_TIMEOUT_SECONDS * 1000;

const handleProcessJob = createProcessJobHandler(
  {
    jobs: createJobRepository(supabase),
    resolve: createMediaResolver({ baseUrl: env.PARSER_API_URL, timeoutMs }),
    download: (url, destPath, options) => downloadToFile(url, destPath, { timeoutMs, ...options }),
    transcoder: createTranscoder({ ffmpegPath: env.FFMPEG_PATH }),
    storage: createS3ObjectStore({ client: s3Client, presignClient: s3PresignClient, bucket: S3_BUCKET }),
    workRoot: env.TEMP_DIR,
  },
  { timeoutMs }
);

// Remove scratch directories left behind by crashes/OOM kills
const usage = getWorkspaceDiskUsage(env.TEMP_DIR);
console.log(`[worker] Workspace usage: ${usage.usedMB.toFixed(0)}MB (${usage.files} files)`);
cleanupStaleWorkspaces(env.TEMP_DIR, 2).catch((error) => {
  console.error("[worker] Stale workspace cleanup failed:", error);
});

const worker = new Worker<ProcessJobTask, PipelineOutcome>(PROCESS_JOB_QUEUE, handleProcessJob, {
  connection: redis,
  concurrency: env.WORKER_CONCURRENCY,
  // Longer than the job deadline so a healthy run never looks stalled
  lockDuration: timeoutMs + 60_000,
});

console.log("[worker] Starting worker for queue:", PROCESS_JOB_QUEUE);
console.log("[worker] Concurrency:", env.WORKER_CONCURRENCY);
console.log("[worker] Job timeout:", `${env.JOB_TIMEOUT_SECONDS}s`);
console.log("[worker] Waiting for jobs...");

worker.on("completed", (job, result) => {
  console.log(`[worker] ✓ completed ${job.id} (${result.outcome})`);
});

worker.on("failed", (job, err) => {
  console.error(`[worker] ✗ failed ${job?.id} after ${job?.attemptsMade ?? 0} attempts: ${err.message}`);
});

worker.on("error", (err) => {
  console.error("[worker] Worker error:", err);
});

async function shutdown(signal: string): Promise<void> {
  console.log(`[worker] ${signal} received, closing`);
  await worker.close();
  await redis.quit();
  process.exit(0);
}

process.on("SIGTERM", () => {
  shutdown("SIGTERM").catch((error) => {
    console.error("[worker] Shutdown failed:", error);
    process.exit(1);
  });
});
process.on("SIGINT", () => {
  shutdown("SIGINT").catch((error) => {
    console.error("[worker] Shutdown failed:", error);
    process.exit(1);
  });
});
