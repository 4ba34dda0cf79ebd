/**
 * Request schemas for job and admin endpoints.
 */

import { z } from "zod";

export const createJobSchema = z.object({
  url: z.string({ required_error: "url is required" }).trim().min(1, "url is required"),
});

export type CreateJobBody = z.infer<typeof createJobSchema>;

export const cleanupSchema = z.object({
  retentionDays: z.number().int().positive("retentionDays must be a positive integer").optional(),
});

export type CleanupBody = z.infer<typeof cleanupSchema>;

/** Invalid or missing limits fall back to the repository default. */
export const listJobsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional().catch(undefined),
});
