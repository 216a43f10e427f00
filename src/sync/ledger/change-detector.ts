import type { SyncItem } from "@/sync/types";
import { compareTimestamps, parseTimestamp } from "./timestamps";
import type { ChangeSet, TrackerRecord } from "./types";

export interface DetectOptions {
  /**
   * Re-publish items whose last attempt failed even if the remote timestamp
   * has not moved. Defaults to true.
   */
  retryFailed?: boolean;
}

/**
 * Decide whether a fetched item must be (re)published.
 *
 * First-seen items always sync. Otherwise the item syncs only when its remote
 * timestamp is strictly newer than the one recorded on the last attempt.
 * Unparsable timestamps fail open.
 */
export function shouldSync(
  remote: SyncItem,
  tracked: TrackerRecord | undefined,
  options: DetectOptions = {},
): boolean {
  if (!tracked) return true;

  if ((options.retryFailed ?? true) && tracked.lastSyncStatus === "FAILED") {
    return true;
  }

  const trackedTime = parseTimestamp(tracked.lastSyncedUpdateTime);
  if (!trackedTime) return true;

  const remoteTime = parseTimestamp(remote.updatedAt);
  if (!remoteTime) return true;

  return compareTimestamps(remoteTime, trackedTime) > 0;
}

/**
 * Compare a batch of fetched items against the tracker to find
 * what's new, what's changed, and what's unchanged.
 */
export async function detectChanges(
  items: SyncItem[],
  lookup: (sourceId: string) => Promise<TrackerRecord | undefined>,
  options: DetectOptions = {},
): Promise<ChangeSet<SyncItem>> {
  const result: ChangeSet<SyncItem> = { new: [], changed: [], unchanged: [] };

  for (const item of items) {
    const existing = await lookup(item.id);

    if (!existing) {
      result.new.push(item);
    } else if (shouldSync(item, existing, options)) {
      result.changed.push(item);
    } else {
      result.unchanged.push(item);
    }
  }

  return result;
}
