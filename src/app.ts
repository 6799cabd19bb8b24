import express, { type Express } from "express";
import helmet from "helmet";
import { createRouter } from "./routes/index.js";
import type { BotStatus } from "./routes/health.js";
import { createErrorHandler } from "./middlewares/errorHandler.js";

/**
 * Health server application.
 * Exposes liveness and readiness of the bot for container orchestration.
 */
export function createApp(status: BotStatus, nodeEnv: string): Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());

  app.use(createRouter(status));

  /** Global error handler - MUST be last. */
  app.use(createErrorHandler(nodeEnv));

  return app;
}
