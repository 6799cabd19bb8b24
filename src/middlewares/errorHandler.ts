/**
 * Error Handler Middleware
 * Centralized error handling for the health server.
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from "express";

/**
 * Builds the global error handler. Stack traces are included outside production.
 * MUST be registered last in middleware chain.
 */
export function createErrorHandler(nodeEnv: string): ErrorRequestHandler {
  return (error: Error, req: Request, res: Response, _next: NextFunction): void => {
    const message = error.message || "Internal server error";

    console.error(`[health] 500 - ${message}`, {
      error: error.name,
      stack: error.stack,
      path: req.path,
      method: req.method,
    });

    const response: { error: string; stack?: string } = { error: message };
    if (nodeEnv !== "production") {
      response.stack = error.stack;
    }

    res.status(500).json(response);
  };
}
