/**
 * Job Routes
 */

import { Router, type RequestHandler } from "express";
import type { JobController } from "../controllers/jobController.js";
import { validateBody } from "../middlewares/validation.js";
import { createJobSchema } from "../middlewares/schemas/jobSchemas.js";

export function createJobsRouter(controller: JobController, streamJobStatus: RequestHandler<{ id: string }>): Router {
  const router = Router();

  router.post("/", validateBody(createJobSchema), controller.create);
  router.get("/", controller.list);
  router.get("/:id", controller.get);
  router.get("/:id/download", controller.download);
  router.get("/:id/events", streamJobStatus);
  router.post("/:id/retry", controller.retry);

  return router;
}
