import pg from "pg";
import { TrackerStoreError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import type { SourceType } from "@/sync/types";
import { toTrackerRecord, type RawTrackerRow } from "./repository";
import type { SyncStatus, TrackerRecord, TrackerStore } from "./types";

const { Pool } = pg;

const log = createChildLogger("tracker-postgres");

// Timestamps from the sources are kept as TEXT so naive and offset-aware
// values round-trip unchanged.
const SCHEMA = `
CREATE TABLE IF NOT EXISTS sync_tracker (
  source_id TEXT PRIMARY KEY,
  source_type TEXT NOT NULL,
  last_synced_update_time TEXT NOT NULL,
  destination_doc_id TEXT NOT NULL DEFAULT '',
  last_sync_status TEXT NOT NULL,
  last_synced_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_tracker_type_status ON sync_tracker(source_type, last_sync_status);
`;

const UPSERT = `
INSERT INTO sync_tracker (source_id, source_type, last_synced_update_time, destination_doc_id, last_sync_status, last_synced_at)
VALUES ($1, $2, $3, $4, $5, NOW())
ON CONFLICT (source_id) DO UPDATE SET
  source_type = EXCLUDED.source_type,
  last_synced_update_time = EXCLUDED.last_synced_update_time,
  destination_doc_id = EXCLUDED.destination_doc_id,
  last_sync_status = EXCLUDED.last_sync_status,
  last_synced_at = NOW()
`;

/** Tracker store backed by a Postgres table (pg connection pool). */
export class PostgresTrackerStore implements TrackerStore {
  private pool: pg.Pool;

  private constructor(pool: pg.Pool) {
    this.pool = pool;
  }

  static async open(connectionString: string): Promise<PostgresTrackerStore> {
    const pool = new Pool({ connectionString, max: 2 });
    pool.on("error", (err) => {
      log.error("Database pool error", { error: err.message });
    });

    try {
      await pool.query(SCHEMA);
    } catch (error) {
      await pool.end();
      throw new TrackerStoreError("open", null, error);
    }
    return new PostgresTrackerStore(pool);
  }

  async get(sourceId: string): Promise<TrackerRecord | undefined> {
    try {
      const result = await this.pool.query<RawTrackerRow>(
        "SELECT * FROM sync_tracker WHERE source_id = $1",
        [sourceId],
      );
      const row = result.rows[0];
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
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new TrackerStoreError("upsert", sourceId, error);
    }

    try {
      await client.query("BEGIN");
      await client.query(UPSERT, [sourceId, sourceType, updatedAt, destinationDocId, status]);
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK").catch((rollbackError: unknown) => {
        log.warn("Rollback failed", {
          sourceId,
          error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        });
      });
      throw new TrackerStoreError("upsert", sourceId, error);
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    try {
      await this.pool.end();
    } catch (error) {
      throw new TrackerStoreError("close", null, error);
    }
  }
}
