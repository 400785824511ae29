import type { ResourceKind } from "@/sync/types";
import type { SyncStatus } from "@/sync/engine/progress";

export interface RawSyncRunRow {
  id: number;
  run_id: string;
  user_id: number;
  resource_kind: string;
  status: string;
  total: number;
  processed: number;
  created: number;
  updated: number;
  removed: number;
  cursor_page: number;
  per_page: number;
  last_error: string | null;
  retry_count: number;
  started_at: string | null;
  completed_at: string | null;
  created_at: string;
}

export const SYNC_STATUSES: readonly SyncStatus[] = ["pending", "running", "paused", "completed", "failed"];

export function isSyncStatus(value: string): value is SyncStatus {
  return SYNC_STATUSES.some((status) => status === value);
}

export function isResourceKind(value: string): value is ResourceKind {
  return value === "collection" || value === "inventory";
}
