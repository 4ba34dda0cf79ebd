/**
 * Process Job Handler
 * Adapts the pipeline to BullMQ: enforces the job deadline and tells BullMQ
 * not to schedule further attempts for terminal failures.
 */

import { UnrecoverableError } from "bullmq";
import type { ProcessJobTask } from "../../services/external/queue/enqueueProcessJob.js";
import { JobTimeoutError, PipelineError } from "../../utils/errors.js";
import {
  processJobOrchestrator,
  type PipelineDeps,
  type PipelineOutcome,
} from "../orchestrators/processJobOrchestrator.js";

/** The parts of a BullMQ Job the handler reads. */
export interface DeliveredTask {
  id?: string;
  data: ProcessJobTask;
  attemptsMade: number;
}

export interface HandlerOptions {
  timeoutMs: number;
}

export function createProcessJobHandler(deps: PipelineDeps, { timeoutMs }: HandlerOptions) {
  return async function handleProcessJob(job: DeliveredTask): Promise<PipelineOutcome> {
    const { jobId } = job.data;
    console.log(`[worker] Processing job ${jobId} (attempt ${job.attemptsMade + 1})`);

    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(new JobTimeoutError(timeoutMs)), timeoutMs);

    try {
      return await processJobOrchestrator(job.data, deps, { signal: deadline.signal });
    } catch (error) {
      if (error instanceof PipelineError && !error.retryable) {
        throw new UnrecoverableError(error.message);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  };
}
