import Database from "better-sqlite3";
import path from "path";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS sync_tracker (
  source_id TEXT PRIMARY KEY,
  source_type TEXT NOT NULL,
  last_synced_update_time TEXT NOT NULL,
  destination_doc_id TEXT NOT NULL DEFAULT '',
  last_sync_status TEXT NOT NULL,
  last_synced_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tracker_type_status ON sync_tracker(source_type, last_sync_status);
`;

/**
 * Accepts a plain file path, `:memory:`, or a SQLAlchemy-style URL
 * (`sqlite:///relative.db`, `sqlite:////abs/path.db`).
 */
export function resolveSqlitePath(url: string): string {
  let target = url.trim();
  if (target.startsWith("sqlite:")) {
    target = target.slice("sqlite:".length);
    if (target.startsWith("//")) target = target.slice(2);
    if (target.startsWith("/")) target = target.slice(1);
  }
  if (!target || target === ":memory:") return ":memory:";
  return path.resolve(target);
}

export function openDatabase(url: string): Database.Database {
  const file = resolveSqlitePath(url);
  const db = new Database(file);
  if (file !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.exec(SCHEMA);
  return db;
}
