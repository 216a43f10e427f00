import { runSync, type SyncOptions } from "@/sync";
import { SyncInProgressError, errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import type { RunReport } from "@/sync/types";

const log = createChildLogger("sync-runner");

export type LastRunState =
  | { status: "never_run"; message: string; lastRunTime: null }
  | (RunReport & { lastRunTime: string });

const NEVER_RUN: LastRunState = Object.freeze({
  status: "never_run",
  message: "No sync has run yet",
  lastRunTime: null,
});

// ── Single-run lock ────────────────────────────────────────────────────────
// One run per process. A request that arrives while a run is in flight is
// rejected, never queued and never started alongside it.

let inFlight: { startedAt: string; promise: Promise<RunReport> } | null = null;

// ── Last run ───────────────────────────────────────────────────────────────
// Replaced as a whole, frozen object when a run finishes.

let lastRun: LastRunState = NEVER_RUN;

export function isSyncRunning(): boolean {
  return inFlight !== null;
}

export function getLastRun(): LastRunState {
  return lastRun;
}

/**
 * Run a sync and wait for its report. Rejects with SyncInProgressError when
 * another run holds the lock.
 */
export function runExclusive(options?: SyncOptions): Promise<RunReport> {
  if (inFlight) {
    return Promise.reject(new SyncInProgressError(inFlight.startedAt));
  }

  const startedAt = new Date().toISOString();
  const promise = runSync(options)
    .then((report) => {
      publishLastRun(report);
      return report;
    })
    .finally(() => {
      inFlight = null;
    });
  inFlight = { startedAt, promise };
  return promise;
}

/**
 * Start a sync without waiting for it. Returns false when a run is already in
 * flight; the report becomes visible through getLastRun() once it finishes.
 */
export function startInBackground(options?: SyncOptions): boolean {
  if (inFlight) {
    log.info("Background sync requested while a run is in flight, rejecting", { runningSince: inFlight.startedAt });
    return false;
  }

  runExclusive(options).catch((error: unknown) => {
    log.error("Background sync failed", { error: errorMessage(error) });
  });
  return true;
}

/** Resolves once the in-flight run (if any) has finished. */
export async function waitForIdle(): Promise<void> {
  const current = inFlight;
  if (current) {
    await current.promise.catch(() => undefined);
  }
}

function publishLastRun(report: RunReport): void {
  lastRun = Object.freeze({ ...report, lastRunTime: new Date().toISOString() });
}

/** Test hook: forget the last run. */
export function resetLastRun(): void {
  lastRun = NEVER_RUN;
}
