/**
 * Re-enqueue jobs stuck in `queued`.
 *
 * Usage: npm run redispatch -- [minutes]
 * Picks jobs that have been queued for longer than `minutes` (default 15).
 */

import "dotenv/config";
import { env } from "../config/env.js";
import { supabase } from "../config/supabase.js";
import { queues } from "../config/queues.js";
import { redis } from "../config/redis.js";
import { createJobRepository } from "../repositories/jobRepository.js";
import { createTaskDispatcher } from "../services/external/queue/enqueueProcessJob.js";
import { redispatchQueuedJobs } from "../services/business/redispatchService.js";

async function main(): Promise<void> {
  const minutes = process.argv[2] ? parseInt(process.argv[2], 10) : 15;
  if (!Number.isInteger(minutes) || minutes < 0) {
    throw new Error(`Invalid minutes: ${process.argv[2]}`);
  }

  const queuedBefore = new Date(Date.now() - minutes * 60 * 1000);
  console.log(`🔍 Looking for jobs queued before ${queuedBefore.toISOString()}...\n`);

  const result = await redispatchQueuedJobs(
    createJobRepository(supabase),
    createTaskDispatcher(queues.processJob, { attempts: env.JOB_MAX_ATTEMPTS }),
    queuedBefore
  );

  console.log(`✅ Dispatched ${result.dispatched} of ${result.found} jobs (${result.failed} failed)`);
  await queues.processJob.close();
  await redis.quit();
}

main()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error("❌ Redispatch failed:", error);
    process.exit(1);
  });
