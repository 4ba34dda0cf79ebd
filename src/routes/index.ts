/**
 * Route Aggregator
 * Combines all routers into a single router.
 */

import { Router, type RequestHandler } from "express";
import { createHealthRouter } from "./health.js";
import { createJobsRouter } from "./jobs.js";
import { createAdminRouter } from "./admin.js";
import type { JobController } from "../controllers/jobController.js";
import type { AdminController } from "../controllers/adminController.js";

export interface RouterDeps {
  jobController: JobController;
  adminController: AdminController;
  streamJobStatus: RequestHandler<{ id: string }>;
  isReady?: () => boolean;
}

export function createRouter({ jobController, adminController, streamJobStatus, isReady }: RouterDeps): Router {
  const router = Router();

  /** Register all route modules */
  router.use(createHealthRouter(isReady));
  router.use("/jobs", createJobsRouter(jobController, streamJobStatus));
  router.use("/admin", createAdminRouter(adminController));

  return router;
}
