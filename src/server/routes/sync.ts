import { Router } from "express";
import { z } from "zod";
import { SyncInProgressError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { getLastRun, runExclusive, startInBackground } from "@/sync/runner";
import type { RunReport } from "@/sync/types";

const log = createChildLogger("api-sync");

export const syncRequestSchema = z
  .object({
    async: z.boolean().default(false),
  })
  .strict();

const router = Router();

/**
 * POST /sync: Run a sync now.
 *
 * Body (optional):
 *   async?: boolean  return 202 immediately; poll GET /status for the report
 */
router.post("/sync", async (req, res, next) => {
  const parsed = syncRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    res.status(400).json({ error: "Invalid request", details: parsed.error.issues });
    return;
  }

  const isAsync = parsed.data.async;
  log.info("Sync requested", { requestId: req.requestId, async: isAsync });

  if (isAsync) {
    if (!startInBackground()) {
      res.status(409).json(busyResponse());
      return;
    }
    res.status(202).json({
      status: "started",
      message: "Sync started in the background",
      async: true,
      timestamp: new Date().toISOString(),
    });
    return;
  }

  try {
    const report = await runExclusive();
    res.status(statusCodeFor(report)).json(report);
  } catch (error) {
    if (error instanceof SyncInProgressError) {
      res.status(409).json(busyResponse(error.runningSince));
      return;
    }
    next(error);
  }
});

/** GET /status: the most recent completed run, or a never-run placeholder. */
router.get("/status", (_req, res) => {
  res.json(getLastRun());
});

export function statusCodeFor(report: RunReport): number {
  if (report.status === "error") return 500;
  return report.failed > 0 ? 207 : 200;
}

function busyResponse(runningSince?: string) {
  return {
    status: "busy",
    message: "A sync run is already in progress",
    ...(runningSince ? { runningSince } : {}),
    timestamp: new Date().toISOString(),
  };
}

export default router;
