import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { previewSync, runSync } from "@/sync";
import { TrackerStoreError } from "@/sync/errors";
import { SqliteTrackerStore } from "@/sync/ledger/repository";
import type { TrackerStore } from "@/sync/ledger/types";
import type { SourceType, SyncItem } from "@/sync/types";

const ENV = {
  ATLASSIAN_URL: "https://example.atlassian.net",
  ATLASSIAN_EMAIL: "bot@example.com",
  ATLASSIAN_API_TOKEN: "test-token",
  DIFY_API_KEY: "test-key",
  DIFY_API_URL: "https://dify.example.com/v1",
  DIFY_DATASET_ID: "dataset-1",
};

function jiraItem(id: string, updatedAt = "2024-01-01T10:00:00.000+0000"): SyncItem {
  return { id, type: "JIRA", updatedAt, content: `Title: ${id}\n\nDescription: None\n\nStatus: Open` };
}

function pageItem(id: string, updatedAt = "2024-01-01T10:00:00.000Z"): SyncItem {
  return { id, type: "CONFLUENCE", updatedAt, content: `Title: ${id}\n\nContent: text` };
}

function makeSource(type: SourceType, items: SyncItem[]) {
  return { type, fetch: vi.fn(async () => items) };
}

function makePublisher(failing: string[] = []) {
  return {
    publish: vi.fn(async (name: string, _content: string): Promise<string | null> =>
      failing.includes(name) ? null : `doc-${name}`,
    ),
  };
}

describe("runSync", () => {
  let store: SqliteTrackerStore;

  beforeEach(() => {
    store = SqliteTrackerStore.open(":memory:");
  });

  afterEach(async () => {
    await store.close();
  });

  it("publishes every new item and records it", async () => {
    const publisher = makePublisher();
    const report = await runSync({
      env: ENV,
      dependencies: { sources: [makeSource("JIRA", [jiraItem("PROJ-1")])], publisher, store },
    });

    expect(report).toMatchObject({
      status: "success",
      synced: 1,
      skipped: 0,
      failed: 0,
      total: 1,
      message: "Sync complete: 1 synced, 0 skipped, 0 failed",
      error: null,
      results: [{ sourceId: "PROJ-1", sourceType: "JIRA", action: "synced", destinationDocId: "doc-PROJ-1" }],
    });
    expect(publisher.publish).toHaveBeenCalledWith("PROJ-1", "Title: PROJ-1\n\nDescription: None\n\nStatus: Open");
    expect(await store.get("PROJ-1")).toMatchObject({
      lastSyncedUpdateTime: "2024-01-01T10:00:00.000+0000",
      destinationDocId: "doc-PROJ-1",
      lastSyncStatus: "SUCCESS",
    });
  });

  it("skips everything on an immediate re-run", async () => {
    const items = [jiraItem("PROJ-1"), jiraItem("PROJ-2"), pageItem("12345")];
    const publisher = makePublisher();
    const dependencies = {
      sources: [makeSource("JIRA", items.slice(0, 2)), makeSource("CONFLUENCE", items.slice(2))],
      publisher,
      store,
    };

    await runSync({ env: ENV, dependencies });
    const second = await runSync({ env: ENV, dependencies });

    expect(second).toMatchObject({ status: "success", synced: 0, skipped: 3, failed: 0, total: 3 });
    expect(publisher.publish).toHaveBeenCalledTimes(3);
  });

  it("re-publishes an item whose remote timestamp moved", async () => {
    const publisher = makePublisher();
    await runSync({ env: ENV, dependencies: { sources: [makeSource("JIRA", [jiraItem("PROJ-1")])], publisher, store } });

    const report = await runSync({
      env: ENV,
      dependencies: {
        sources: [makeSource("JIRA", [jiraItem("PROJ-1", "2024-01-01T10:00:01.000+0000")])],
        publisher,
        store,
      },
    });

    expect(report).toMatchObject({ synced: 1, skipped: 0, total: 1 });
    expect((await store.get("PROJ-1"))?.lastSyncedUpdateTime).toBe("2024-01-01T10:00:01.000+0000");
  });

  it("keeps going when one item fails to publish", async () => {
    const publisher = makePublisher(["PROJ-2"]);
    const report = await runSync({
      env: ENV,
      dependencies: {
        sources: [makeSource("JIRA", [jiraItem("PROJ-1"), jiraItem("PROJ-2"), jiraItem("PROJ-3")])],
        publisher,
        store,
      },
    });

    expect(report).toMatchObject({
      status: "success",
      synced: 2,
      skipped: 0,
      failed: 1,
      total: 3,
      message: "Sync complete: 2 synced, 0 skipped, 1 failed",
    });
    expect(report.results.map((r) => r.action)).toEqual(["synced", "failed", "synced"]);
    expect(report.results[1]?.error).toBe("Destination returned no document id");
    expect(await store.get("PROJ-2")).toMatchObject({
      lastSyncedUpdateTime: "2024-01-01T10:00:00.000+0000",
      destinationDocId: "",
      lastSyncStatus: "FAILED",
    });
  });

  it("counts a publisher that throws as a failure", async () => {
    const publisher = {
      publish: vi.fn(async (): Promise<string | null> => {
        throw new Error("socket hang up");
      }),
    };
    const report = await runSync({
      env: ENV,
      dependencies: { sources: [makeSource("JIRA", [jiraItem("PROJ-1")])], publisher, store },
    });

    expect(report).toMatchObject({ status: "success", synced: 0, failed: 1, total: 1 });
    expect(report.results[0]?.error).toBe("socket hang up");
  });

  describe("failed items on the next run", () => {
    async function firstRunWithFailure() {
      await runSync({
        env: ENV,
        dependencies: {
          sources: [makeSource("JIRA", [jiraItem("PROJ-1"), jiraItem("PROJ-2")])],
          publisher: makePublisher(["PROJ-2"]),
          store,
        },
      });
    }

    it("retries them by default", async () => {
      await firstRunWithFailure();
      const publisher = makePublisher();

      const report = await runSync({
        env: ENV,
        dependencies: { sources: [makeSource("JIRA", [jiraItem("PROJ-1"), jiraItem("PROJ-2")])], publisher, store },
      });

      expect(report).toMatchObject({ synced: 1, skipped: 1, failed: 0 });
      expect(publisher.publish).toHaveBeenCalledTimes(1);
      expect(publisher.publish).toHaveBeenCalledWith("PROJ-2", expect.any(String));
    });

    it("leaves them alone when retries are off", async () => {
      await firstRunWithFailure();
      const publisher = makePublisher();

      const report = await runSync({
        env: { ...ENV, SYNC_RETRY_FAILED: "false" },
        dependencies: { sources: [makeSource("JIRA", [jiraItem("PROJ-1"), jiraItem("PROJ-2")])], publisher, store },
      });

      expect(report).toMatchObject({ synced: 0, skipped: 2, failed: 0 });
      expect(publisher.publish).not.toHaveBeenCalled();
    });
  });

  it("aborts before fetching when configuration is incomplete", async () => {
    const jira = makeSource("JIRA", [jiraItem("PROJ-1")]);
    const { DIFY_API_KEY: _omitted, ...incomplete } = ENV;

    const report = await runSync({
      env: incomplete,
      dependencies: { sources: [jira], publisher: makePublisher(), store },
    });

    expect(jira.fetch).not.toHaveBeenCalled();
    expect(report).toMatchObject({
      status: "error",
      synced: 0,
      skipped: 0,
      failed: 0,
      total: 0,
      message: "Configuration error",
      error: "Configuration error: missing required settings: DIFY_API_KEY",
      results: [],
    });
  });

  it("reports an empty fetch as success", async () => {
    const report = await runSync({
      env: ENV,
      dependencies: { sources: [makeSource("JIRA", []), makeSource("CONFLUENCE", [])], publisher: makePublisher(), store },
    });

    expect(report).toMatchObject({
      status: "success",
      synced: 0,
      skipped: 0,
      failed: 0,
      total: 0,
      message: "no data to sync",
      error: null,
    });
  });

  it("publishes in fetch order, Jira before Confluence", async () => {
    const publisher = makePublisher();
    await runSync({
      env: ENV,
      dependencies: {
        sources: [makeSource("JIRA", [jiraItem("PROJ-2"), jiraItem("PROJ-1")]), makeSource("CONFLUENCE", [pageItem("777")])],
        publisher,
        store,
      },
    });

    expect(publisher.publish.mock.calls.map((c) => c[0])).toEqual(["PROJ-2", "PROJ-1", "777"]);
  });

  it("only fetches the requested source types", async () => {
    const jira = makeSource("JIRA", [jiraItem("PROJ-1")]);
    const confluence = makeSource("CONFLUENCE", [pageItem("777")]);

    const report = await runSync({
      env: ENV,
      sourceTypes: ["CONFLUENCE"],
      dependencies: { sources: [jira, confluence], publisher: makePublisher(), store },
    });

    expect(jira.fetch).not.toHaveBeenCalled();
    expect(report.results).toEqual([
      { sourceId: "777", sourceType: "CONFLUENCE", action: "synced", destinationDocId: "doc-777" },
    ]);
  });

  it("treats a failed tracker read as a missing record", async () => {
    await store.upsert("PROJ-1", "JIRA", "2024-01-01T10:00:00.000+0000", "doc-PROJ-1", "SUCCESS");
    const flaky: TrackerStore = {
      get: async (sourceId) => {
        throw new TrackerStoreError("get", sourceId, new Error("database is locked"));
      },
      upsert: (...args) => store.upsert(...args),
      close: async () => undefined,
    };
    const publisher = makePublisher();

    const report = await runSync({
      env: ENV,
      dependencies: { sources: [makeSource("JIRA", [jiraItem("PROJ-1")])], publisher, store: flaky },
    });

    expect(report).toMatchObject({ synced: 1, skipped: 0, failed: 0 });
    expect(publisher.publish).toHaveBeenCalledTimes(1);
  });

  it("counts a failed tracker write as a failure even after publishing", async () => {
    const readOnly: TrackerStore = {
      get: (sourceId) => store.get(sourceId),
      upsert: async (sourceId) => {
        throw new TrackerStoreError("upsert", sourceId, new Error("disk I/O error"));
      },
      close: async () => undefined,
    };

    const report = await runSync({
      env: ENV,
      dependencies: { sources: [makeSource("JIRA", [jiraItem("PROJ-1")])], publisher: makePublisher(), store: readOnly },
    });

    expect(report).toMatchObject({ status: "success", synced: 0, failed: 1, total: 1 });
    expect(report.results[0]).toEqual({
      sourceId: "PROJ-1",
      sourceType: "JIRA",
      action: "failed",
      destinationDocId: "doc-PROJ-1",
      error: "Tracker store upsert failed for PROJ-1: disk I/O error",
    });
  });

  it("turns an unexpected error into an error report", async () => {
    const broken = {
      type: "JIRA" as const,
      fetch: vi.fn(async (): Promise<SyncItem[]> => {
        throw new Error("boom");
      }),
    };

    const report = await runSync({
      env: ENV,
      dependencies: { sources: [broken], publisher: makePublisher(), store },
    });

    expect(report).toMatchObject({
      status: "error",
      total: 0,
      message: "Sync aborted by an unexpected error",
      error: "Unexpected error during sync: boom",
    });
  });

  it("leaves an injected store open", async () => {
    await runSync({ env: ENV, dependencies: { sources: [makeSource("JIRA", [])], publisher: makePublisher(), store } });
    await expect(store.get("PROJ-1")).resolves.toBeUndefined();
  });

  it("gives each run its own id and time range", async () => {
    const dependencies = { sources: [makeSource("JIRA", [])], publisher: makePublisher(), store };
    const first = await runSync({ env: ENV, dependencies });
    const second = await runSync({ env: ENV, dependencies });

    expect(first.runId).not.toBe(second.runId);
    expect(Date.parse(first.endTime)).toBeGreaterThanOrEqual(Date.parse(first.startTime));
  });
});

describe("previewSync", () => {
  it("classifies items per source without publishing", async () => {
    const store = SqliteTrackerStore.open(":memory:");
    await store.upsert("PROJ-1", "JIRA", "2024-01-01T10:00:00.000+0000", "doc-1", "SUCCESS");
    await store.upsert("PROJ-2", "JIRA", "2024-01-01T10:00:00.000+0000", "doc-2", "SUCCESS");

    const preview = await previewSync({
      env: ENV,
      dependencies: {
        sources: [
          makeSource("JIRA", [
            jiraItem("PROJ-1"),
            jiraItem("PROJ-2", "2024-01-02T00:00:00.000+0000"),
            jiraItem("PROJ-3"),
          ]),
          makeSource("CONFLUENCE", [pageItem("777")]),
        ],
        store,
      },
    });

    expect(preview.JIRA.new.map((i) => i.id)).toEqual(["PROJ-3"]);
    expect(preview.JIRA.changed.map((i) => i.id)).toEqual(["PROJ-2"]);
    expect(preview.JIRA.unchanged.map((i) => i.id)).toEqual(["PROJ-1"]);
    expect(preview.CONFLUENCE.new.map((i) => i.id)).toEqual(["777"]);
    expect((await store.get("PROJ-2"))?.lastSyncedUpdateTime).toBe("2024-01-01T10:00:00.000+0000");
    await store.close();
  });

  it("throws on invalid configuration", async () => {
    await expect(previewSync({ env: {} })).rejects.toMatchObject({ name: "ConfigError" });
  });
});
