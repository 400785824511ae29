import { withStore } from "./db";
import { isResourceKind, isSyncStatus, type RawSyncRunRow } from "./types";
import type { ResourceKind } from "@/sync/types";
import { SyncProgress } from "@/sync/engine/progress";

// --- Sync Runs ---

export function insertRun(progress: SyncProgress): SyncProgress {
  return withStore("insertRun", (db) => {
    const result = db.prepare(`
      INSERT INTO sync_runs (
        run_id, user_id, resource_kind, status, total, processed, created, updated, removed,
        cursor_page, per_page, last_error, retry_count, started_at, completed_at, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      progress.runId,
      progress.userId,
      progress.resourceKind,
      progress.status,
      progress.total,
      progress.processed,
      progress.created,
      progress.updated,
      progress.removed,
      progress.cursor.page,
      progress.cursor.perPage,
      progress.lastError,
      progress.retryCount,
      progress.startedAt,
      progress.completedAt,
      progress.createdAt,
    );
    progress.id = Number(result.lastInsertRowid);
    return progress;
  });
}

/** Commit the run's current state. Called after every record. */
export function saveRun(progress: SyncProgress): void {
  withStore("saveRun", (db) => {
    db.prepare(`
      UPDATE sync_runs
      SET status = ?, total = ?, processed = ?, created = ?, updated = ?, removed = ?,
          cursor_page = ?, per_page = ?, last_error = ?, retry_count = ?,
          started_at = ?, completed_at = ?
      WHERE run_id = ?
    `).run(
      progress.status,
      progress.total,
      progress.processed,
      progress.created,
      progress.updated,
      progress.removed,
      progress.cursor.page,
      progress.cursor.perPage,
      progress.lastError,
      progress.retryCount,
      progress.startedAt,
      progress.completedAt,
      progress.runId,
    );
  });
}

export function findRun(runId: string): SyncProgress | undefined {
  return withStore("findRun", (db) => {
    const row = db
      .prepare<[string], RawSyncRunRow>("SELECT * FROM sync_runs WHERE run_id = ?")
      .get(runId);
    return row ? toSyncProgress(row) : undefined;
  });
}

export function findActiveRun(userId: number, kind: ResourceKind): SyncProgress | undefined {
  return withStore("findActiveRun", (db) => {
    const row = db
      .prepare<[number, string], RawSyncRunRow>(`
        SELECT * FROM sync_runs
        WHERE user_id = ? AND resource_kind = ? AND status IN ('running', 'paused')
        ORDER BY created_at DESC, id DESC
        LIMIT 1
      `)
      .get(userId, kind);
    return row ? toSyncProgress(row) : undefined;
  });
}

export function findLatestRun(userId: number, kind: ResourceKind): SyncProgress | undefined {
  return listRuns(userId, kind, 1)[0];
}

/** Newest first. */
export function listRuns(userId: number, kind: ResourceKind, limit: number): SyncProgress[] {
  return withStore("listRuns", (db) => {
    const rows = db
      .prepare<[number, string, number], RawSyncRunRow>(`
        SELECT * FROM sync_runs
        WHERE user_id = ? AND resource_kind = ?
        ORDER BY created_at DESC, id DESC
        LIMIT ?
      `)
      .all(userId, kind, limit);
    return rows.map(toSyncProgress);
  });
}

/**
 * The running or paused run for this user and kind, or a newly inserted
 * pending one. Keeps at most one active run per pair.
 */
export function getOrCreateActive(userId: number, kind: ResourceKind, perPage = 100): SyncProgress {
  const active = findActiveRun(userId, kind);
  if (active) return active;
  return insertRun(SyncProgress.create(userId, kind, perPage));
}

// --- Internal helpers ---

function toSyncProgress(row: RawSyncRunRow): SyncProgress {
  if (!isResourceKind(row.resource_kind)) {
    throw new Error(`Unknown resource kind in sync_runs: ${row.resource_kind}`);
  }
  if (!isSyncStatus(row.status)) {
    throw new Error(`Unknown sync status in sync_runs: ${row.status}`);
  }
  return new SyncProgress({
    id: row.id,
    runId: row.run_id,
    userId: row.user_id,
    resourceKind: row.resource_kind,
    status: row.status,
    cursor: { page: row.cursor_page, perPage: row.per_page },
    total: row.total,
    processed: row.processed,
    created: row.created,
    updated: row.updated,
    removed: row.removed,
    lastError: row.last_error,
    retryCount: row.retry_count,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    createdAt: row.created_at,
  });
}
