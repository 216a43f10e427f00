import { Router } from "express";
import { isSyncRunning } from "@/sync/runner";

const router = Router();

router.get("/health", (_req, res) => {
  res.json({
    status: "healthy",
    timestamp: new Date().toISOString(),
    service: "sync-api",
    syncRunning: isSyncRunning(),
  });
});

export default router;
