import { randomUUID } from "crypto";
import type {
  DocumentPublisher,
  ItemResult,
  RunReport,
  SourceAdapter,
  SourceType,
  SyncItem,
} from "@/sync/types";
import { loadSyncEnv, type SyncEnv } from "@/sync/config/env";
import { ConfigError, errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { AtlassianClient } from "@/sync/atlassian/client";
import { JiraSource } from "@/sync/atlassian/jira-source";
import { ConfluenceSource } from "@/sync/atlassian/confluence-source";
import { DifyPublisher } from "@/sync/dify/client";
import { detectChanges, shouldSync, type DetectOptions } from "@/sync/ledger/change-detector";
import { openTrackerStore } from "@/sync/ledger/store";
import type { ChangeSet, TrackerRecord, TrackerStore } from "@/sync/ledger/types";

const log = createChildLogger("sync-engine");

export const NO_DATA_MESSAGE = "no data to sync";

export interface SyncDependencies {
  sources: SourceAdapter[];
  publisher: DocumentPublisher;
  store: TrackerStore;
}

export interface SyncOptions {
  /** Environment to validate; defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /**
   * Collaborators to use instead of the ones built from configuration.
   * An injected store is left open when the run ends.
   */
  dependencies?: Partial<SyncDependencies>;
  /** Only fetch from these source kinds. */
  sourceTypes?: SourceType[];
}

export type SyncPreview = Record<SourceType, ChangeSet<SyncItem>>;

/** Source adapters enabled by configuration, in the order they are fetched. */
export function createSources(env: SyncEnv): SourceAdapter[] {
  const client = new AtlassianClient(
    { url: env.ATLASSIAN_URL, email: env.ATLASSIAN_EMAIL, apiToken: env.ATLASSIAN_API_TOKEN },
    { timeoutMs: env.SYNC_REQUEST_TIMEOUT_MS },
  );

  const sources: SourceAdapter[] = [
    new JiraSource(client, {
      projectKey: env.JIRA_PROJECT_KEY,
      since: env.JIRA_SINCE,
      pageSize: env.SYNC_PAGE_SIZE,
    }),
  ];

  if (env.CONFLUENCE_SPACE_KEY) {
    sources.push(
      new ConfluenceSource(client, {
        spaceKey: env.CONFLUENCE_SPACE_KEY,
        sinceDays: env.CONFLUENCE_SINCE_DAYS,
        pageSize: env.SYNC_PAGE_SIZE,
      }),
    );
  } else {
    log.info("CONFLUENCE_SPACE_KEY not set, skipping Confluence");
  }

  return sources;
}

export function createPublisher(env: SyncEnv): DocumentPublisher {
  return new DifyPublisher(
    { apiUrl: env.DIFY_API_URL, apiKey: env.DIFY_API_KEY, datasetId: env.DIFY_DATASET_ID },
    { timeoutMs: env.SYNC_REQUEST_TIMEOUT_MS },
  );
}

/**
 * Run one reconciliation pass: validate config, fetch every source, then
 * publish and record each new or changed item in fetch order.
 *
 * Never rejects. Per-item failures are counted in the report; only a config
 * problem or an error before the item loop yields `status: "error"`.
 */
export async function runSync(options: SyncOptions = {}): Promise<RunReport> {
  const runId = randomUUID();
  const startTime = new Date().toISOString();
  let store: TrackerStore | null = null;
  let ownsStore = false;

  log.info("Starting sync run", { runId, sourceTypes: options.sourceTypes ?? "all" });

  try {
    const env = loadSyncEnv(options.env);
    log.info("Configuration validated", { runId });

    if (options.dependencies?.store) {
      store = options.dependencies.store;
    } else {
      store = await openTrackerStore(env.DATABASE_URL);
      ownsStore = true;
    }
    const sources = options.dependencies?.sources ?? createSources(env);
    const publisher = options.dependencies?.publisher ?? createPublisher(env);

    const items = await fetchAll(sources, options.sourceTypes);
    if (items.length === 0) {
      log.info("Sources returned no items", { runId });
      return buildReport(runId, startTime, [], NO_DATA_MESSAGE);
    }

    log.info("Fetched items, checking for changes", { runId, total: items.length });

    const detect: DetectOptions = { retryFailed: env.SYNC_RETRY_FAILED };
    const results: ItemResult[] = [];
    for (const [index, item] of items.entries()) {
      log.debug("Processing item", { progress: `${index + 1}/${items.length}`, sourceId: item.id, type: item.type });
      results.push(await reconcileItem(item, store, publisher, detect));
    }

    const report = buildReport(runId, startTime, results);
    log.info("Sync run complete", {
      runId,
      synced: report.synced,
      skipped: report.skipped,
      failed: report.failed,
      total: report.total,
    });
    return report;
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error("Configuration invalid, sync aborted", { runId, settings: error.settings, error: error.message });
      return buildErrorReport(runId, startTime, "Configuration error", `Configuration error: ${error.message}`);
    }
    log.error("Sync run failed", {
      runId,
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return buildErrorReport(
      runId,
      startTime,
      "Sync aborted by an unexpected error",
      `Unexpected error during sync: ${errorMessage(error)}`,
    );
  } finally {
    if (ownsStore && store) {
      await store.close().catch((error: unknown) => {
        log.warn("Failed to close tracker store", { runId, error: errorMessage(error) });
      });
    }
  }
}

/**
 * Fetch and classify items without publishing or writing anything. Throws
 * ConfigError when configuration is invalid.
 */
export async function previewSync(options: SyncOptions = {}): Promise<SyncPreview> {
  const env = loadSyncEnv(options.env);
  const store = options.dependencies?.store ?? (await openTrackerStore(env.DATABASE_URL));
  const sources = options.dependencies?.sources ?? createSources(env);

  try {
    const items = await fetchAll(sources, options.sourceTypes);
    const detect: DetectOptions = { retryFailed: env.SYNC_RETRY_FAILED };
    const lookup = (sourceId: string) => safeLookup(store, sourceId);

    const ofType = (type: SourceType) => items.filter((i) => i.type === type);

    return {
      JIRA: await detectChanges(ofType("JIRA"), lookup, detect),
      CONFLUENCE: await detectChanges(ofType("CONFLUENCE"), lookup, detect),
    };
  } finally {
    if (!options.dependencies?.store) {
      await store.close();
    }
  }
}

async function fetchAll(sources: SourceAdapter[], only?: SourceType[]): Promise<SyncItem[]> {
  const items: SyncItem[] = [];
  for (const source of sources) {
    if (only && !only.includes(source.type)) continue;
    const fetched = await source.fetch();
    log.info("Source fetched", { source: source.type, count: fetched.length });
    items.push(...fetched);
  }
  return items;
}

/** A failed lookup reads as "no record", forcing a resync rather than a skip. */
async function safeLookup(store: TrackerStore, sourceId: string): Promise<TrackerRecord | undefined> {
  try {
    return await store.get(sourceId);
  } catch (error) {
    log.warn("Tracker lookup failed, treating item as unsynced", { sourceId, error: errorMessage(error) });
    return undefined;
  }
}

async function reconcileItem(
  item: SyncItem,
  store: TrackerStore,
  publisher: DocumentPublisher,
  detect: DetectOptions,
): Promise<ItemResult> {
  const base = { sourceId: item.id, sourceType: item.type };

  try {
    const tracked = await safeLookup(store, item.id);

    if (!shouldSync(item, tracked, detect)) {
      log.debug("Unchanged, skipping", { sourceId: item.id });
      return { ...base, action: "skipped" };
    }

    log.info(tracked ? "Change detected, syncing" : "New item, syncing", {
      sourceId: item.id,
      remote: item.updatedAt,
      tracked: tracked?.lastSyncedUpdateTime,
      lastStatus: tracked?.lastSyncStatus,
    });

    let docId: string | null = null;
    let publishError = "Destination returned no document id";
    try {
      docId = await publisher.publish(item.id, item.content);
    } catch (error) {
      publishError = errorMessage(error);
    }

    // The remote timestamp is recorded on failure too; retryFailed decides
    // whether the next run tries the item again.
    try {
      await store.upsert(item.id, item.type, item.updatedAt, docId ?? "", docId ? "SUCCESS" : "FAILED");
    } catch (error) {
      log.error("Failed to record sync result", { sourceId: item.id, error: errorMessage(error) });
      return {
        ...base,
        action: "failed",
        ...(docId ? { destinationDocId: docId } : {}),
        error: errorMessage(error),
      };
    }

    if (!docId) {
      log.error("Sync failed", { sourceId: item.id, error: publishError });
      return { ...base, action: "failed", error: publishError };
    }

    log.info("Synced", { sourceId: item.id, docId });
    return { ...base, action: "synced", destinationDocId: docId };
  } catch (error) {
    log.error("Item sync threw unexpectedly", { sourceId: item.id, error: errorMessage(error) });
    return { ...base, action: "failed", error: errorMessage(error) };
  }
}

function buildReport(runId: string, startTime: string, results: ItemResult[], message?: string): RunReport {
  const synced = results.filter((r) => r.action === "synced").length;
  const skipped = results.filter((r) => r.action === "skipped").length;
  const failed = results.filter((r) => r.action === "failed").length;
  return {
    runId,
    status: "success",
    synced,
    skipped,
    failed,
    total: results.length,
    startTime,
    endTime: new Date().toISOString(),
    message: message ?? `Sync complete: ${synced} synced, ${skipped} skipped, ${failed} failed`,
    error: null,
    results,
  };
}

function buildErrorReport(runId: string, startTime: string, message: string, error: string): RunReport {
  return {
    runId,
    status: "error",
    synced: 0,
    skipped: 0,
    failed: 0,
    total: 0,
    startTime,
    endTime: new Date().toISOString(),
    message,
    error,
    results: [],
  };
}
