import { randomUUID } from "crypto";
import type { ResourceKind } from "@/sync/types";

export type SyncStatus = "pending" | "running" | "paused" | "completed" | "failed";

export interface SyncCursor {
  page: number;
  perPage: number;
}

export interface SyncProgressState {
  id: number | null;
  runId: string;
  userId: number;
  resourceKind: ResourceKind;
  status: SyncStatus;
  cursor: SyncCursor;
  total: number;
  processed: number;
  created: number;
  updated: number;
  removed: number;
  lastError: string | null;
  retryCount: number;
  startedAt: string | null;
  completedAt: string | null;
  createdAt: string;
}

/**
 * One sync attempt for a (user, resource kind) pair. Holds the cursor and
 * counters needed to resume exactly where a paused or failed run stopped.
 */
export class SyncProgress implements SyncProgressState {
  id: number | null;
  runId: string;
  userId: number;
  resourceKind: ResourceKind;
  status: SyncStatus;
  cursor: SyncCursor;
  total: number;
  processed: number;
  created: number;
  updated: number;
  removed: number;
  lastError: string | null;
  retryCount: number;
  startedAt: string | null;
  completedAt: string | null;
  createdAt: string;

  constructor(state: SyncProgressState) {
    this.id = state.id;
    this.runId = state.runId;
    this.userId = state.userId;
    this.resourceKind = state.resourceKind;
    this.status = state.status;
    this.cursor = { ...state.cursor };
    this.total = state.total;
    this.processed = state.processed;
    this.created = state.created;
    this.updated = state.updated;
    this.removed = state.removed;
    this.lastError = state.lastError;
    this.retryCount = state.retryCount;
    this.startedAt = state.startedAt;
    this.completedAt = state.completedAt;
    this.createdAt = state.createdAt;
  }

  static create(userId: number, resourceKind: ResourceKind, perPage = 100): SyncProgress {
    return new SyncProgress({
      id: null,
      runId: randomUUID(),
      userId,
      resourceKind,
      status: "pending",
      cursor: { page: 1, perPage },
      total: 0,
      processed: 0,
      created: 0,
      updated: 0,
      removed: 0,
      lastError: null,
      retryCount: 0,
      startedAt: null,
      completedAt: null,
      createdAt: new Date().toISOString(),
    });
  }

  get progressPercent(): number {
    if (this.total === 0) return 0;
    return (this.processed / this.total) * 100;
  }

  get isComplete(): boolean {
    return this.status === "completed";
  }

  get isRunning(): boolean {
    return this.status === "running";
  }

  get isActive(): boolean {
    return this.status === "running" || this.status === "paused";
  }

  get canResume(): boolean {
    return this.status === "paused" || this.status === "failed";
  }

  start(): void {
    this.status = "running";
    this.startedAt = new Date().toISOString();
  }

  /** Suspend; the cursor is left exactly where it is. */
  pause(): void {
    this.status = "paused";
  }

  fail(error: string): void {
    this.status = "failed";
    this.lastError = error;
    this.retryCount += 1;
  }

  complete(): void {
    this.status = "completed";
    this.completedAt = new Date().toISOString();
  }

  toJSON(): SyncProgressState & { progressPercent: number } {
    return {
      id: this.id,
      runId: this.runId,
      userId: this.userId,
      resourceKind: this.resourceKind,
      status: this.status,
      cursor: { ...this.cursor },
      total: this.total,
      processed: this.processed,
      created: this.created,
      updated: this.updated,
      removed: this.removed,
      lastError: this.lastError,
      retryCount: this.retryCount,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
      createdAt: this.createdAt,
      progressPercent: this.progressPercent,
    };
  }
}
