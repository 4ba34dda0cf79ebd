/**
 * Admin Controller
 * Manual retention sweep.
 */

import type { Request, Response, NextFunction } from "express";
import type { CleanupBody } from "../middlewares/schemas/jobSchemas.js";
import { retentionCutoff, sweepExpiredJobs, type RetentionDeps } from "../services/business/retentionService.js";
import { BadRequestError } from "../utils/errors.js";

export function createAdminController(deps: RetentionDeps, defaultRetentionDays: number) {
  return {
    /**
     * POST /admin/cleanup { retentionDays? }
     * Falls back to the configured retention; 400 when neither is set.
     */
    async cleanup(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const body: CleanupBody = req.body;
        const retentionDays = body.retentionDays ?? defaultRetentionDays;
        if (retentionDays <= 0) {
          throw new BadRequestError("retentionDays is required");
        }
        const result = await sweepExpiredJobs(deps, retentionCutoff(retentionDays));
        res.json(result);
      } catch (error) {
        next(error);
      }
    },
  };
}
export type AdminController = ReturnType<typeof createAdminController>;
