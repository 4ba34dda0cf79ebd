/**
 * Retention Sweep Cron Job
 * Scheduled expiry of stale results and deletion of old jobs.
 */

import cron, { type ScheduledTask } from "node-cron";
import { runRetention, type RetentionDeps, type RetentionPolicy } from "../../services/business/retentionService.js";

/**
 * Starts the sweep on `schedule` when a retention policy is configured.
 * Returns the scheduled task, or null when there is nothing to do.
 */
export function startRetentionSweepJob(
  deps: RetentionDeps,
  policy: RetentionPolicy,
  schedule: string
): ScheduledTask | null {
  if (policy.retentionDays <= 0 && policy.resultTtlHours <= 0) {
    console.log("[retention] No retention configured, sweep not scheduled");
    return null;
  }
  if (!cron.validate(schedule)) {
    throw new Error(`Invalid CLEANUP_CRON expression: ${schedule}`);
  }

  const task = cron.schedule(schedule, async () => {
    console.log("[retention] Sweep starting...");
    try {
      const result = await runRetention(deps, policy);
      console.log(
        `[retention] ✓ Sweep done: expired=${result.expiredJobs} deletedJobs=${result.deletedJobs} deletedObjects=${result.deletedObjects}`
      );
    } catch (error) {
      console.error("[retention] ✗ Sweep failed:", error);
    }
  });

  console.log(`[retention] Sweep scheduled (${schedule})`);
  return task;
}
