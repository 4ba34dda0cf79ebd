/**
 * Redispatch Service
 * Recovers jobs whose row was committed but whose task never reached the
 * broker: anything still `queued` after a grace period is enqueued again.
 */

import type { JobRepository } from "../../repositories/jobRepository.js";
import type { TaskDispatcher } from "../external/queue/enqueueProcessJob.js";
import { errorText, truncate } from "../../utils/errorMessages.js";

export interface RedispatchResult {
  found: number;
  dispatched: number;
  failed: number;
}

export async function redispatchQueuedJobs(
  jobs: JobRepository,
  dispatcher: TaskDispatcher,
  queuedBefore: Date,
  limit = 200
): Promise<RedispatchResult> {
  const stuck = await jobs.listByStatus("queued", queuedBefore, limit);
  let dispatched = 0;

  for (const job of stuck) {
    try {
      await dispatcher.enqueue(job.id, job.source_url);
      dispatched++;
    } catch (error) {
      console.error(`[redispatch] Job ${job.id} could not be enqueued: ${truncate(errorText(error), 200)}`);
    }
  }

  console.log(`[redispatch] ${dispatched}/${stuck.length} queued jobs dispatched again`);
  return { found: stuck.length, dispatched, failed: stuck.length - dispatched };
}
