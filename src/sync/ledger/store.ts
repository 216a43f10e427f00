import { createChildLogger } from "@/sync/logger";
import { PostgresTrackerStore } from "./postgres";
import { SqliteTrackerStore } from "./repository";
import type { TrackerStore } from "./types";

const log = createChildLogger("tracker-store");

export type TrackerBackend = "postgres" | "sqlite";

export function backendFor(databaseUrl: string): TrackerBackend {
  return /^postgres(ql)?:\/\//i.test(databaseUrl.trim()) ? "postgres" : "sqlite";
}

/**
 * Open the tracker store for DATABASE_URL. This is the only place that knows
 * which backend is in use.
 */
export async function openTrackerStore(databaseUrl: string): Promise<TrackerStore> {
  const backend = backendFor(databaseUrl);
  log.info("Opening tracker store", { backend });
  return backend === "postgres"
    ? PostgresTrackerStore.open(databaseUrl)
    : SqliteTrackerStore.open(databaseUrl);
}
