import { NextFunction, Request, Response } from "express";
import { logger } from "@config/logger";
import { AppError, ValidationError } from "@core/errors/app-errors";

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: `Route ${req.method} ${req.path} not found` });
}

// Express recognises error handlers by their four parameters.
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error(`Error handling ${req.method} ${req.path}:`, err);
    } else {
      logger.warn(`${err.code} on ${req.method} ${req.path}: ${err.message}`);
    }

    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      ...(err instanceof ValidationError && err.details.length > 0 ? { details: err.details } : {}),
    });
    return;
  }

  logger.error("Error:", err);
  res.status(500).json({ error: "Internal server error", code: "INTERNAL_ERROR" });
}
