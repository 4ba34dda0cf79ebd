/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";

export function createHealthRouter(isReady: () => boolean = () => true): Router {
  const healthRouter = Router();

  /** Simple health check endpoint. */
  healthRouter.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  /** Readiness check: 503 until startup initialisation has finished. */
  healthRouter.get("/ready", (_req, res) => {
    const ready = isReady();
    res.status(ready ? 200 : 503).json({ ready });
  });

  return healthRouter;
}
