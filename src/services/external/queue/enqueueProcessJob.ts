/**
 * Enqueue processing task for a conversion job.
 * Uses BullMQ with Redis (TCP). Delivery is at-least-once: the worker must
 * tolerate seeing the same job id more than once.
 */

import type { JobsOptions } from "bullmq";
import { errorText } from "../../../utils/errorMessages.js";
import { DispatchError } from "../../../utils/errors.js";

export const PROCESS_JOB_QUEUE = "processJob";
export const PROCESS_JOB_TASK = "process_job";

export interface ProcessJobTask {
  jobId: string;
  sourceUrl: string;
}

/** The slice of a BullMQ Queue the dispatcher relies on. */
export interface TaskQueue {
  add(name: string, data: ProcessJobTask, opts?: JobsOptions): Promise<unknown>;
  getJob(id: string): Promise<QueuedTask | undefined>;
}

export interface QueuedTask {
  getState(): Promise<string>;
  remove(): Promise<void>;
}

export interface TaskDispatcher {
  /** Throws DispatchError when the broker cannot be reached. */
  enqueue(jobId: string, sourceUrl: string): Promise<void>;
}

export interface DispatcherOptions {
  /** Total delivery attempts per task, including the first. */
  attempts?: number;
  /** Base delay for exponential backoff between attempts. */
  backoffMs?: number;
  /** Upper bound on a single broker round trip. */
  brokerTimeoutMs?: number;
}

const PENDING_STATES = new Set(["waiting", "delayed", "prioritized", "waiting-children", "active"]);

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timeout`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createTaskDispatcher(queue: TaskQueue, options: DispatcherOptions = {}): TaskDispatcher {
  const { attempts = 3, backoffMs = 5_000, brokerTimeoutMs = 5_000 } = options;

  async function enqueueTask(task: ProcessJobTask): Promise<void> {
    const existing = await queue.getJob(task.jobId);
    if (existing) {
      const state = await existing.getState();

      // Still waiting, backing off between attempts or running: it will be processed.
      if (PENDING_STATES.has(state)) {
        console.log(`[enqueue] Job ${task.jobId} already ${state}, skipping`);
        return;
      }

      // Completed, failed or unknown (stalled) tasks block re-adding the same id.
      console.log(`[enqueue] Job ${task.jobId} was ${state}, removing to allow retry`);
      await existing.remove();
    }

    await queue.add(PROCESS_JOB_TASK, task, {
      jobId: task.jobId,
      attempts,
      backoff: { type: "exponential", delay: backoffMs },
      removeOnComplete: { age: 86400, count: 1000 },
      removeOnFail: { age: 86400, count: 1000 },
    });
    console.log(`[enqueue] Job ${task.jobId} enqueued`);
  }

  return {
    async enqueue(jobId, sourceUrl) {
      try {
        await withTimeout(enqueueTask({ jobId, sourceUrl }), brokerTimeoutMs, "broker");
      } catch (error) {
        throw new DispatchError(jobId, errorText(error));
      }
    },
  };
}
