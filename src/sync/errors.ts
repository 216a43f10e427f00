/**
 * Base class for errors raised by the sync engine and its collaborators.
 */
export class SyncError extends Error {
  constructor(message: string, public code: string, public originalError?: unknown) {
    super(message);
    this.name = "SyncError";
  }
}

export interface ConfigIssue {
  setting: string;
  problem: "missing" | "placeholder" | "invalid";
  detail: string;
}

/**
 * Required settings are missing or still hold template values.
 * Carries every offending setting, not just the first one found.
 */
export class ConfigError extends SyncError {
  constructor(public issues: ConfigIssue[]) {
    super(formatIssues(issues), "CONFIG_ERROR");
    this.name = "ConfigError";
  }

  get settings(): string[] {
    return this.issues.map((i) => i.setting);
  }
}

/** A source adapter could not reach or authenticate against its service. */
export class SourceFetchError extends SyncError {
  constructor(public source: string, message: string, originalError?: unknown) {
    super(`${source} fetch failed: ${message}`, "SOURCE_FETCH_ERROR", originalError);
    this.name = "SourceFetchError";
  }
}

/** The destination rejected a document or could not be reached. */
export class PublishError extends SyncError {
  constructor(public documentName: string, message: string, public statusCode?: number, originalError?: unknown) {
    super(`Publishing "${documentName}" failed: ${message}`, "PUBLISH_ERROR", originalError);
    this.name = "PublishError";
  }
}

export class TrackerStoreError extends SyncError {
  constructor(public operation: "open" | "get" | "upsert" | "close", sourceId: string | null, originalError?: unknown) {
    super(
      `Tracker store ${operation} failed${sourceId ? ` for ${sourceId}` : ""}: ${errorMessage(originalError)}`,
      "TRACKER_STORE_ERROR",
      originalError,
    );
    this.name = "TrackerStoreError";
  }
}

export class SyncInProgressError extends SyncError {
  constructor(public runningSince: string) {
    super(`A sync run is already in progress (started ${runningSince})`, "SYNC_IN_PROGRESS");
    this.name = "SyncInProgressError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatIssues(issues: ConfigIssue[]): string {
  const missing = issues.filter((i) => i.problem === "missing").map((i) => i.setting);
  const placeholders = issues.filter((i) => i.problem === "placeholder").map((i) => i.setting);
  const invalid = issues.filter((i) => i.problem === "invalid").map((i) => `${i.setting} (${i.detail})`);

  const parts: string[] = [];
  if (missing.length) parts.push(`missing required settings: ${missing.join(", ")}`);
  if (placeholders.length) parts.push(`settings still hold template values: ${placeholders.join(", ")}`);
  if (invalid.length) parts.push(`invalid settings: ${invalid.join(", ")}`);
  return parts.length ? parts.join("; ") : "invalid configuration";
}
