import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "crypto";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("http");

declare global {
  namespace Express {
    interface Request {
      requestId: string;
    }
  }
}

export function loggingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = randomUUID();
  req.requestId = requestId;

  const start = Date.now();

  res.on("finish", () => {
    log.info("Request completed", {
      requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Date.now() - start,
    });
  });

  next();
}
