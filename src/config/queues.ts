/**
 * BullMQ queues
 */

import { Queue } from "bullmq";
import { redis } from "./redis.js";
import { PROCESS_JOB_QUEUE, type ProcessJobTask } from "../services/external/queue/enqueueProcessJob.js";

export const queues = {
  processJob: new Queue<ProcessJobTask>(PROCESS_JOB_QUEUE, { connection: redis }),
};
