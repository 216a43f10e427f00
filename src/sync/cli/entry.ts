import "dotenv/config";
import { runInteractiveSync } from "./interactive";
import { getServerEnv } from "@/sync/config/env";
import { runExclusive } from "@/sync/runner";
import { startScheduler, stopScheduler } from "@/sync/scheduler";

const args = process.argv.slice(2);
const isAuto = args.includes("--auto") || args.includes("--once");
const isSchedule = args.includes("--schedule");

async function main() {
  if (isAuto) {
    // Headless mode: one run, report on stdout
    const report = await runExclusive();
    console.log(JSON.stringify(report, null, 2));
    process.exitCode = report.status === "error" ? 1 : 0;
  } else if (isSchedule) {
    // Foreground scheduler: runs until interrupted
    const env = getServerEnv();
    const started = startScheduler({
      hour: env.SCHEDULE_HOUR,
      minute: env.SCHEDULE_MINUTE,
      timezone: env.SCHEDULE_TIMEZONE,
    });
    if (!started) {
      throw new Error("Scheduler could not start; check SCHEDULE_HOUR, SCHEDULE_MINUTE and SCHEDULE_TIMEZONE.");
    }
    const stop = () => {
      stopScheduler();
      process.exit(0);
    };
    process.on("SIGINT", stop);
    process.on("SIGTERM", stop);
  } else {
    // Interactive mode: friendly prompts
    await runInteractiveSync();
  }
}

main().catch((err: unknown) => {
  console.error("Sync failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
