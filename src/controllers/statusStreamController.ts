/**
 * Status Stream Controller
 * Server-Sent Events for a single job's status.
 */

import type { Request, Response, NextFunction } from "express";
import type { Job, JobRepository } from "../repositories/jobRepository.js";
import type { JobService } from "../services/business/jobService.js";
import { watchJobStatus } from "../services/business/statusStreamService.js";

export interface StatusStreamOptions {
  pollIntervalMs?: number;
  keepaliveMs?: number;
}

export function createStatusStreamController(
  jobs: JobRepository,
  service: JobService,
  options: StatusStreamOptions = {}
) {
  /**
   * GET /jobs/:id/events
   * Sends `data: <snapshot>` on every change and `: keepalive` while idle.
   * Closes after a terminal snapshot or when the client disconnects.
   */
  return async function streamJobStatus(
    req: Request<{ id: string }>,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    const jobId = req.params.id;

    let initial: Job;
    try {
      initial = await jobs.get(jobId);
    } catch (error) {
      next(error);
      return;
    }

    console.log(`[sse] Client connected for job ${jobId}`);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no"); // Disable nginx buffering
    res.flushHeaders();

    const disconnected = new AbortController();
    res.on("close", () => disconnected.abort());

    try {
      for await (const event of watchJobStatus(jobs, initial, { ...options, signal: disconnected.signal })) {
        if (event.type === "keepalive") {
          res.write(": keepalive\n\n");
          continue;
        }
        const view = await service.toView(event.job);
        res.write(`data: ${JSON.stringify(view)}\n\n`);
      }
    } catch (error) {
      console.error(`[sse] Error streaming job ${jobId}:`, error);
    } finally {
      if (disconnected.signal.aborted) {
        console.log(`[sse] Client disconnected from job ${jobId}`);
      }
      res.end();
    }
  };
}
