import Database from "better-sqlite3";
import path from "path";
import { LocalStoreError } from "@/sync/errors";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS releases (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL,
  remote_id TEXT NOT NULL,
  title TEXT NOT NULL,
  artist TEXT NOT NULL,
  label TEXT,
  catalog_number TEXT,
  year INTEGER,
  cover_art_url TEXT,
  uri TEXT,
  notes TEXT,
  user_corrections TEXT,
  kept_after_removal INTEGER,
  last_exported_at TEXT,
  last_seen_run_id TEXT,
  synced_at TEXT,
  removed_at TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE(user_id, remote_id)
);

CREATE TABLE IF NOT EXISTS tracks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  release_id INTEGER NOT NULL REFERENCES releases(id) ON DELETE CASCADE,
  position TEXT NOT NULL,
  title TEXT NOT NULL,
  duration TEXT,
  bpm INTEGER CHECK (bpm IS NULL OR (bpm >= 20 AND bpm <= 300)),
  musical_key TEXT,
  camelot TEXT,
  energy INTEGER CHECK (energy IS NULL OR (energy >= 1 AND energy <= 10)),
  is_playable INTEGER NOT NULL DEFAULT 0,
  notes TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tracks_release ON tracks(release_id);

CREATE TABLE IF NOT EXISTS tags (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL,
  name TEXT NOT NULL,
  UNIQUE(user_id, name)
);

CREATE TABLE IF NOT EXISTS track_tags (
  track_id INTEGER NOT NULL REFERENCES tracks(id) ON DELETE CASCADE,
  tag_id INTEGER NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
  PRIMARY KEY (track_id, tag_id)
);

CREATE TABLE IF NOT EXISTS inventory_listings (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL,
  remote_id TEXT NOT NULL,
  release_remote_id TEXT NOT NULL,
  release_id INTEGER REFERENCES releases(id) ON DELETE SET NULL,
  release_title TEXT,
  release_artist TEXT,
  condition TEXT,
  sleeve_condition TEXT,
  price TEXT,
  location TEXT,
  comments TEXT,
  status TEXT NOT NULL DEFAULT 'for_sale',
  listed_at TEXT,
  sold_at TEXT,
  notes TEXT,
  notification_dismissed INTEGER NOT NULL DEFAULT 0,
  last_exported_at TEXT,
  last_seen_run_id TEXT,
  synced_at TEXT,
  removed_at TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE(user_id, remote_id)
);

CREATE INDEX IF NOT EXISTS idx_listings_release ON inventory_listings(user_id, release_remote_id);

CREATE TABLE IF NOT EXISTS sync_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL UNIQUE,
  user_id INTEGER NOT NULL,
  resource_kind TEXT NOT NULL,
  status TEXT NOT NULL,
  total INTEGER NOT NULL DEFAULT 0,
  processed INTEGER NOT NULL DEFAULT 0,
  created INTEGER NOT NULL DEFAULT 0,
  updated INTEGER NOT NULL DEFAULT 0,
  removed INTEGER NOT NULL DEFAULT 0,
  cursor_page INTEGER NOT NULL DEFAULT 1,
  per_page INTEGER NOT NULL DEFAULT 100,
  last_error TEXT,
  retry_count INTEGER NOT NULL DEFAULT 0,
  started_at TEXT,
  completed_at TEXT,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_runs_user_kind ON sync_runs(user_id, resource_kind, created_at);
CREATE INDEX IF NOT EXISTS idx_runs_status ON sync_runs(user_id, resource_kind, status);
`;

let _db: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (!_db) {
    const configured = process.env.SYNC_DB_PATH;
    const dbPath = configured === ":memory:"
      ? configured
      : configured
        ? path.resolve(configured)
        : path.resolve(process.cwd(), "wax_sync.db");

    _db = new Database(dbPath);
    _db.pragma("journal_mode = WAL");
    _db.pragma("foreign_keys = ON");
    _db.exec(SCHEMA);
  }
  return _db;
}

export function closeDatabase(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

/** Run a store operation, reporting any failure as a LocalStoreError. */
export function withStore<T>(operation: string, fn: (db: Database.Database) => T): T {
  try {
    return fn(getDatabase());
  } catch (error) {
    if (error instanceof LocalStoreError) throw error;
    throw new LocalStoreError(operation, error);
  }
}
