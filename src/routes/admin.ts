/**
 * Admin Routes
 */

import { Router } from "express";
import type { AdminController } from "../controllers/adminController.js";
import { validateBody } from "../middlewares/validation.js";
import { cleanupSchema } from "../middlewares/schemas/jobSchemas.js";

export function createAdminRouter(controller: AdminController): Router {
  const router = Router();

  router.post("/cleanup", validateBody(cleanupSchema), controller.cleanup);

  return router;
}
