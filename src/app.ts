import express, { type Express } from "express";
import helmet from "helmet";
import cors, { type CorsOptions } from "cors";
import { createRouter } from "./routes/index.js";
import { createRateLimiter } from "./middlewares/rateLimiting.js";
import { requireApiToken } from "./middlewares/auth.middleware.js";
import { createErrorHandler } from "./middlewares/errorHandler.js";
import { createJobController } from "./controllers/jobController.js";
import { createAdminController } from "./controllers/adminController.js";
import { createStatusStreamController } from "./controllers/statusStreamController.js";
import { createJobService } from "./services/business/jobService.js";
import type { JobRepository } from "./repositories/jobRepository.js";
import type { ObjectStore } from "./services/external/storage.js";
import type { TaskDispatcher } from "./services/external/queue/enqueueProcessJob.js";

export interface AppConfig {
  nodeEnv: string;
  resultUrlTtlSeconds: number;
  apiToken?: string;
  /** Empty allows every origin. */
  corsAllowOrigins: string[];
  /** Requests per client per minute; 0 disables admission control. */
  rateLimitPerMin: number;
  /** Default horizon for POST /admin/cleanup; 0 means the body must give one. */
  jobRetentionDays: number;
  statusPollIntervalMs?: number;
  statusKeepaliveMs?: number;
}

export interface AppDeps {
  jobs: JobRepository;
  storage: ObjectStore;
  dispatcher: TaskDispatcher;
  config: AppConfig;
  isReady?: () => boolean;
  /** Clock for the rate limiter. */
  now?: () => number;
}

function corsOptions(allowOrigins: string[]): CorsOptions {
  const allowAll = allowOrigins.length === 0 || allowOrigins.includes("*");
  return {
    origin: allowAll ? "*" : allowOrigins,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Authorization", "Content-Type", "X-API-KEY"],
    exposedHeaders: ["Retry-After", "X-RateLimit-Limit", "X-RateLimit-Remaining"],
  };
}

/**
 * Builds the Express application.
 * Configures global middleware and routes.
 */
export function createApp({ jobs, storage, dispatcher, config, isReady, now }: AppDeps): Express {
  const app = express();

  const jobService = createJobService({
    jobs,
    storage,
    dispatcher,
    resultUrlTtlSeconds: config.resultUrlTtlSeconds,
  });

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());
  /** CORS allow-list; rate-limit headers are readable cross-origin. */
  app.use(cors(corsOptions(config.corsAllowOrigins)));

  /** Admission control runs before auth. */
  app.use(createRateLimiter(config.rateLimitPerMin, undefined, now));
  app.use(requireApiToken(config.apiToken));

  /** Parses JSON request bodies. */
  app.use(express.json({ limit: "64kb" }));

  /** Application routes. */
  app.use(
    createRouter({
      jobController: createJobController(jobService),
      adminController: createAdminController({ jobs, storage }, config.jobRetentionDays),
      streamJobStatus: createStatusStreamController(jobs, jobService, {
        pollIntervalMs: config.statusPollIntervalMs,
        keepaliveMs: config.statusKeepaliveMs,
      }),
      isReady,
    })
  );

  /** Global error handler - MUST be last. */
  app.use(createErrorHandler({ exposeStack: config.nodeEnv !== "production" }));

  return app;
}
