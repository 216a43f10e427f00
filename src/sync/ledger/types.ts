import type { SourceType } from "@/sync/types";

export type SyncStatus = "SUCCESS" | "FAILED";

export interface TrackerRecord {
  sourceId: string;
  sourceType: SourceType;
  /** Remote timestamp as of the last attempt, stored exactly as the source sent it. */
  lastSyncedUpdateTime: string;
  /** Empty when the last attempt failed. */
  destinationDocId: string;
  lastSyncStatus: SyncStatus;
  lastSyncedAt: string;
}

/**
 * Durable per-item sync state. One row per source id; writes overwrite in place.
 * Every failure surfaces as a TrackerStoreError.
 */
export interface TrackerStore {
  get(sourceId: string): Promise<TrackerRecord | undefined>;
  /** `lastSyncedAt` is always stamped by the store. */
  upsert(
    sourceId: string,
    sourceType: SourceType,
    updatedAt: string,
    destinationDocId: string,
    status: SyncStatus,
  ): Promise<void>;
  close(): Promise<void>;
}

export interface ChangeSet<T> {
  new: T[];
  changed: T[];
  unchanged: T[];
}
