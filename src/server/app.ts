import express from "express";
import { loggingMiddleware } from "./middleware/logging";
import { errorMiddleware } from "./middleware/error";
import healthRouter from "./routes/health";
import syncRouter from "./routes/sync";

export const ENDPOINTS: Record<string, string> = {
  "GET /": "Service info",
  "GET /health": "Health check",
  "POST /sync": "Run a sync (body: { async?: boolean })",
  "GET /status": "Most recent sync report",
};

export function createApp(): express.Application {
  const app = express();

  app.use(express.json());
  app.use(loggingMiddleware);

  app.get("/", (_req, res) => {
    res.json({
      service: "Knowledge Sync API",
      version: "0.1.0",
      endpoints: ENDPOINTS,
    });
  });

  app.use(healthRouter);
  app.use(syncRouter);

  app.use((req, res) => {
    res.status(404).json({
      error: "Not Found",
      message: `No route for ${req.method} ${req.path}`,
      availableEndpoints: Object.keys(ENDPOINTS),
    });
  });

  app.use(errorMiddleware);

  return app;
}
