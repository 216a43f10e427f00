import type Database from "better-sqlite3";
import { TrackerStoreError } from "@/sync/errors";
import type { SourceType } from "@/sync/types";
import { isSourceType, isSyncStatus } from "@/sync/types/guards";
import { openDatabase } from "./db";
import type { SyncStatus, TrackerRecord, TrackerStore } from "./types";

/** Tracker store backed by a local SQLite file (better-sqlite3). */
export class SqliteTrackerStore implements TrackerStore {
  private db: Database.Database | null;

  constructor(db: Database.Database) {
    this.db = db;
  }

  static open(url: string): SqliteTrackerStore {
    try {
      return new SqliteTrackerStore(openDatabase(url));
    } catch (error) {
      throw new TrackerStoreError("open", null, error);
    }
  }

  async get(sourceId: string): Promise<TrackerRecord | undefined> {
    try {
      const row = this.connection()
        .prepare<[string], RawTrackerRow>("SELECT * FROM sync_tracker WHERE source_id = ?")
        .get(sourceId);
      return row ? toTrackerRecord(row) : undefined;
    } catch (error) {
      throw new TrackerStoreError("get", sourceId, error);
    }
  }

  async upsert(
    sourceId: string,
    sourceType: SourceType,
    updatedAt: string,
    destinationDocId: string,
    status: SyncStatus,
  ): Promise<void> {
    try {
      const db = this.connection();
      const now = new Date().toISOString();
      const statement = db.prepare(`
        INSERT INTO sync_tracker (source_id, source_type, last_synced_update_time, destination_doc_id, last_sync_status, last_synced_at)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(source_id) DO UPDATE SET
          source_type = excluded.source_type,
          last_synced_update_time = excluded.last_synced_update_time,
          destination_doc_id = excluded.destination_doc_id,
          last_sync_status = excluded.last_sync_status,
          last_synced_at = excluded.last_synced_at
      `);
      db.transaction(() => {
        statement.run(sourceId, sourceType, updatedAt, destinationDocId, status, now);
      })();
    } catch (error) {
      throw new TrackerStoreError("upsert", sourceId, error);
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private connection(): Database.Database {
    if (!this.db) {
      throw new Error("Tracker store is closed");
    }
    return this.db;
  }
}

// --- Row mapping (shared with the Postgres store) ---

export interface RawTrackerRow {
  source_id: string;
  source_type: string;
  last_synced_update_time: string;
  destination_doc_id: string | null;
  last_sync_status: string;
  last_synced_at: string | Date;
}

export function toTrackerRecord(row: RawTrackerRow): TrackerRecord {
  if (!isSourceType(row.source_type)) {
    throw new Error(`Unknown source type "${row.source_type}" for ${row.source_id}`);
  }
  if (!isSyncStatus(row.last_sync_status)) {
    throw new Error(`Unknown sync status "${row.last_sync_status}" for ${row.source_id}`);
  }
  return {
    sourceId: row.source_id,
    sourceType: row.source_type,
    lastSyncedUpdateTime: row.last_synced_update_time,
    destinationDocId: row.destination_doc_id ?? "",
    lastSyncStatus: row.last_sync_status,
    lastSyncedAt: row.last_synced_at instanceof Date ? row.last_synced_at.toISOString() : row.last_synced_at,
  };
}
