/**
 * Manual retention run.
 *
 * Usage: npm run sweep -- [retentionDays]
 * Defaults to JOB_RETENTION_DAYS / RESULT_TTL_HOURS from the environment.
 */

import "dotenv/config";
import { env } from "../config/env.js";
import { supabase } from "../config/supabase.js";
import { s3Client, S3_BUCKET } from "../config/s3.js";
import { createJobRepository } from "../repositories/jobRepository.js";
import { createS3ObjectStore } from "../services/external/storage.js";
import { runRetention } from "../services/business/retentionService.js";

async function main(): Promise<void> {
  const arg = process.argv[2];
  const retentionDays = arg ? parseInt(arg, 10) : env.JOB_RETENTION_DAYS;
  if (!Number.isInteger(retentionDays) || retentionDays < 0) {
    throw new Error(`Invalid retention days: ${arg}`);
  }

  const result = await runRetention(
    { jobs: createJobRepository(supabase), storage: createS3ObjectStore({ client: s3Client, bucket: S3_BUCKET }) },
    { retentionDays, resultTtlHours: env.RESULT_TTL_HOURS }
  );

  console.log(`✅ Expired ${result.expiredJobs} results`);
  console.log(`✅ Deleted ${result.deletedJobs} jobs and ${result.deletedObjects} objects`);
}

main()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error("❌ Sweep failed:", error);
    process.exit(1);
  });
