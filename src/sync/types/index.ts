/** Source kinds the engine knows how to mirror. Extend the union to add one. */
export type SourceType = "JIRA" | "CONFLUENCE";

export const SOURCE_TYPES: readonly SourceType[] = ["JIRA", "CONFLUENCE"];

export interface SyncItem {
  /** Unique within its source type; used as the tracker key and document name. */
  id: string;
  type: SourceType;
  /** Remote last-modified time, with or without a UTC offset depending on the source. */
  updatedAt: string;
  content: string;
}

export interface SourceAdapter {
  readonly type: SourceType;
  /**
   * Fetch one bounded page of candidate items. Connectivity and auth failures
   * are logged and yield an empty list; this never rejects.
   */
  fetch(): Promise<SyncItem[]>;
}

export interface DocumentPublisher {
  /** Returns the destination document id, or null when the destination rejected the document. */
  publish(name: string, content: string): Promise<string | null>;
}

export type ItemAction = "synced" | "skipped" | "failed";

export interface ItemResult {
  sourceId: string;
  sourceType: SourceType;
  action: ItemAction;
  destinationDocId?: string;
  error?: string;
}

export type RunStatus = "success" | "error";

export interface RunReport {
  runId: string;
  status: RunStatus;
  synced: number;
  skipped: number;
  failed: number;
  total: number;
  startTime: string;
  endTime: string;
  message: string;
  error: string | null;
  results: ItemResult[];
}
