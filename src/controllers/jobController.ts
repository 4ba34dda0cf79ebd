/**
 * Job Controller
 * Handles HTTP requests for conversion jobs.
 */

import type { Request, Response, NextFunction } from "express";
import type { JobService } from "../services/business/jobService.js";
import type { CreateJobBody } from "../middlewares/schemas/jobSchemas.js";
import { listJobsQuerySchema } from "../middlewares/schemas/jobSchemas.js";

export function createJobController(service: JobService) {
  return {
    /**
     * POST /jobs
     * Accepts a link (or share text containing one) and queues a conversion.
     */
    async create(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { url }: CreateJobBody = req.body;
        const accepted = await service.createJob(url);
        res.status(202).json(accepted);
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /jobs?limit=
     */
    async list(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { limit } = listJobsQuerySchema.parse(req.query);
        const jobs = await service.listJobs(limit);
        res.json({ jobs });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /jobs/:id
     */
    async get(req: Request<{ id: string }>, res: Response, next: NextFunction): Promise<void> {
      try {
        res.json(await service.getJob(req.params.id));
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /jobs/:id/download
     * Redirects to a freshly signed URL; 409 until the job is ready.
     */
    async download(req: Request<{ id: string }>, res: Response, next: NextFunction): Promise<void> {
      try {
        res.redirect(302, await service.getDownloadUrl(req.params.id));
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /jobs/:id/retry
     */
    async retry(req: Request<{ id: string }>, res: Response, next: NextFunction): Promise<void> {
      try {
        res.status(202).json(await service.retryJob(req.params.id));
      } catch (error) {
        next(error);
      }
    },
  };
}

export type JobController = ReturnType<typeof createJobController>;
