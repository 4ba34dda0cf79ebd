/**
 * HTTP Server Entry Point
 * Initializes and starts the Express application on a specified port.
 * Handles graceful shutdown on SIGTERM signal.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { allowedOrigins, env } from "./config/env.js";
import { initializeApp } from "./config/init.js";
import { queues } from "./config/queues.js";
import { supabase } from "./config/supabase.js";
import { s3Client, s3PresignClient, S3_BUCKET } from "./config/s3.js";
import { createJobRepository } from "./repositories/jobRepository.js";
import { createS3ObjectStore } from "./services/external/storage.js";
import { createTaskDispatcher } from "./services/external/queue/enqueueProcessJob.js";
import { startRetentionSweepJob } from "./jobs/crons/retentionSweep.js";

const jobs = createJobRepository(supabase);
const storage = createS3ObjectStore({ client: s3Client, presignClient: s3PresignClient, bucket: S3_BUCKET });
const dispatcher = createTaskDispatcher(queues.processJob, { attempts: env.JOB_MAX_ATTEMPTS });

/** Tracks whether application initialization is complete. */
let isReady = false;

const app = createApp({
  jobs,
  storage,
  dispatcher,
  isReady: () => isReady,
  config: {
    nodeEnv: env.NODE_ENV,
    resultUrlTtlSeconds: env.RESULT_URL_TTL_SECONDS,
    apiToken: env.API_TOKEN,
    corsAllowOrigins: allowedOrigins(env),
    rateLimitPerMin: env.RATE_LIMIT_PER_MIN,
    jobRetentionDays: env.JOB_RETENTION_DAYS,
  },
});

/** HTTP server instance wrapping the Express application. */
const server = createServer(app);

/**
 * Starts the HTTP server immediately.
 * Initialization runs in parallel without blocking server startup.
 */
server.listen(env.PORT, "0.0.0.0", () => {
  console.log(`Server running on 0.0.0.0:${env.PORT}`);

  initializeApp(s3Client, S3_BUCKET)
    .then(() => {
      isReady = true;

      startRetentionSweepJob(
        { jobs, storage },
        { retentionDays: env.JOB_RETENTION_DAYS, resultTtlHours: env.RESULT_TTL_HOURS },
        env.CLEANUP_CRON
      );

      console.log("✓ Server ready to accept requests\n");
    })
    .catch((error) => {
      console.error("✗ Initialization failed:", error);
      process.exit(1);
    });
});

/**
 * Handles graceful shutdown on SIGTERM signal.
 * Closes the server and exits the process cleanly.
 */
process.on("SIGTERM", () => {
  server.close(() => process.exit(0));
});
