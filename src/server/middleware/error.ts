import type { Request, Response, NextFunction } from "express";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("http");

export interface ApiError extends Error {
  statusCode?: number;
  status?: number; // body-parser uses 'status'
}

export function errorMiddleware(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = err.statusCode || err.status || 500;
  const message = statusCode >= 500 ? "Internal server error" : err.message || "Bad request";

  log.error("Request error", {
    requestId: req.requestId,
    method: req.method,
    path: req.originalUrl || req.path,
    error: err.message,
    errorType: err.name,
    statusCode,
    stack: statusCode >= 500 ? err.stack : undefined,
  });

  res.status(statusCode).json({
    error: message,
    requestId: req.requestId,
  });
}
