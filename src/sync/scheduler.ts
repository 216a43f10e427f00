import cron from "node-cron";
import { errorMessage, SyncInProgressError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { runExclusive } from "@/sync/runner";
import type { RunReport } from "@/sync/types";

const log = createChildLogger("scheduler");

export interface DailySchedule {
  hour: number;
  minute: number;
  timezone: string;
}

export function toCronExpression({ hour, minute }: DailySchedule): string {
  return `${minute} ${hour} * * *`;
}

/** One scheduled run. A run already in flight turns this tick into a logged skip. */
export async function scheduledSyncJob(): Promise<RunReport | null> {
  log.info("Scheduled sync triggered", { at: new Date().toISOString() });

  try {
    const report = await runExclusive();
    log.info("Scheduled sync finished", {
      status: report.status,
      synced: report.synced,
      skipped: report.skipped,
      failed: report.failed,
      total: report.total,
      error: report.error,
    });
    return report;
  } catch (error) {
    if (error instanceof SyncInProgressError) {
      log.warn("Previous sync still running, skipping this tick", { runningSince: error.runningSince });
      return null;
    }
    log.error("Scheduled sync failed", { error: errorMessage(error) });
    return null;
  }
}

let task: cron.ScheduledTask | null = null;

export function startScheduler(schedule: DailySchedule): boolean {
  if (task) {
    log.warn("Scheduler already started");
    return true;
  }

  const expression = toCronExpression(schedule);
  if (!cron.validate(expression)) {
    log.error("Invalid schedule", { expression });
    return false;
  }

  task = cron.schedule(
    expression,
    () => {
      scheduledSyncJob().catch((error: unknown) => {
        log.error("Scheduled sync job threw", { error: errorMessage(error) });
      });
    },
    { timezone: schedule.timezone, name: "daily-sync" },
  );

  log.info("Scheduler started", {
    daily: `${String(schedule.hour).padStart(2, "0")}:${String(schedule.minute).padStart(2, "0")}`,
    timezone: schedule.timezone,
  });
  return true;
}

export function stopScheduler(): void {
  if (task) {
    task.stop();
    task = null;
    log.info("Scheduler stopped");
  }
}
