/**
 * Route Aggregator
 * Combines all routers into a single router.
 */

import { Router } from "express";
import { createHealthRouter, type BotStatus } from "./health.js";

export function createRouter(status: BotStatus): Router {
  const router = Router();

  router.use(createHealthRouter(status));

  return router;
}
