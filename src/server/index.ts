import "dotenv/config";
import { createApp } from "./app";
import { getServerEnv } from "@/sync/config/env";
import { logger } from "@/sync/logger";
import { startScheduler, stopScheduler } from "@/sync/scheduler";
import { waitForIdle } from "@/sync/runner";

async function main(): Promise<void> {
  const env = getServerEnv();
  const app = createApp();

  if (env.SCHEDULE_ENABLED) {
    startScheduler({
      hour: env.SCHEDULE_HOUR,
      minute: env.SCHEDULE_MINUTE,
      timezone: env.SCHEDULE_TIMEZONE,
    });
  }

  const server = app.listen(env.API_PORT, env.API_HOST, () => {
    logger.info("Server started", {
      context: "server",
      url: `http://${env.API_HOST}:${env.API_PORT}`,
      scheduler: env.SCHEDULE_ENABLED,
    });
  });

  function shutdown(signal: string): void {
    logger.info("Shutting down", { context: "server", signal });
    stopScheduler();
    server.close(() => {
      // Let a run that is mid-flight finish writing its tracker rows.
      waitForIdle()
        .then(() => process.exit(0))
        .catch(() => process.exit(1));
    });
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.error("Startup failed", {
    context: "server",
    error: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
