/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";

export interface BotStatus {
  /** True while the bot is polling for updates. */
  isReady(): boolean;
  sessionCount(): number;
}

export function createHealthRouter(status: BotStatus): Router {
  const healthRouter = Router();

  /** Simple health check endpoint. */
  healthRouter.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  /** Readiness check endpoint for container orchestration. */
  healthRouter.get("/ready", (_req, res) => {
    const ready = status.isReady();
    res.status(ready ? 200 : 503).json({ ready, sessions: status.sessionCount() });
  });

  return healthRouter;
}
