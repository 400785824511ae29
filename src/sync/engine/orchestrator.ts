import type { NormalizedEntity } from "@/sync/types";
import type { DiscogsClient } from "@/sync/discogs/client";
import { RateLimitedError, errorMessage, isFatalRecordError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { findActiveRun, findLatestRun, getOrCreateActive, insertRun, saveRun } from "@/sync/ledger/repository";
import type { ResourceAdapter } from "./adapter";
import type { EntityStore } from "./merge";
import { SyncProgress } from "./progress";

const log = createChildLogger("sync-engine");

export interface OrchestratorOptions<TEntity extends NormalizedEntity> {
  userId: number;
  client: DiscogsClient;
  adapter: ResourceAdapter<TEntity>;
  store: EntityStore<TEntity>;
  /** Page size for new runs; resumed runs keep the size they started with. */
  perPage?: number;
  /** Checked before each record; an aborted signal pauses the run. */
  signal?: AbortSignal;
  onProgress?: (progress: SyncProgress) => void;
}

type ExecuteResult = "completed" | "cancelled";

/**
 * Drives one sync run: pages from the client, records through the adapter
 * into the store, progress committed after every record, then removal
 * reconciliation. Generic over the resource kind.
 */
export class SyncOrchestrator<TEntity extends NormalizedEntity> {
  private readonly userId: number;
  private readonly client: DiscogsClient;
  private readonly adapter: ResourceAdapter<TEntity>;
  private readonly store: EntityStore<TEntity>;
  private readonly perPage: number;
  private readonly signal?: AbortSignal;
  private readonly onProgress?: (progress: SyncProgress) => void;

  constructor(options: OrchestratorOptions<TEntity>) {
    this.userId = options.userId;
    this.client = options.client;
    this.adapter = options.adapter;
    this.store = options.store;
    this.perPage = options.perPage ?? 100;
    this.signal = options.signal;
    this.onProgress = options.onProgress;
  }

  /**
   * Start a fresh run, or with `resume` continue the paused/failed one.
   * Throws RateLimitedError after pausing; any other escaping error has
   * already been recorded on the run as a failure.
   */
  async run(resume = false): Promise<SyncProgress> {
    const progress = this.resolveRun(resume);
    progress.start();
    saveRun(progress);

    log.info("Starting sync run", {
      runId: progress.runId,
      userId: this.userId,
      kind: this.adapter.kind,
      resume,
      page: progress.cursor.page,
    });

    try {
      const result = await this.execute(progress);

      if (result === "cancelled") {
        progress.pause();
        saveRun(progress);
        log.info("Sync run paused on request", { runId: progress.runId, processed: progress.processed });
        return progress;
      }

      progress.removed += this.store.markUnseenRemoved(this.userId, progress.runId);
      progress.complete();
      saveRun(progress);
    } catch (error) {
      if (error instanceof RateLimitedError) {
        progress.pause();
        progress.lastError = `Rate limited. Retry after ${error.retryAfterSeconds}s`;
        this.persistAfterError(progress);
        log.warn("Sync run paused by rate limit", {
          runId: progress.runId,
          page: progress.cursor.page,
          retryAfter: error.retryAfterSeconds,
        });
        throw error;
      }

      progress.fail(errorMessage(error));
      this.persistAfterError(progress);
      log.error("Sync run failed", { runId: progress.runId, error: errorMessage(error) });
      throw error;
    }

    log.info("Sync run complete", {
      runId: progress.runId,
      kind: this.adapter.kind,
      created: progress.created,
      updated: progress.updated,
      removed: progress.removed,
    });
    return progress;
  }

  private resolveRun(resume: boolean): SyncProgress {
    const kind = this.adapter.kind;

    if (resume) {
      const latest = findLatestRun(this.userId, kind);
      if (latest?.status === "failed") return latest;
      // Paused or crashed mid-run comes back as-is; after a completed run this starts fresh.
      return getOrCreateActive(this.userId, kind, this.perPage);
    }

    const stale = findActiveRun(this.userId, kind);
    if (stale) {
      log.warn("Superseding unfinished sync run", { runId: stale.runId, status: stale.status });
      stale.fail("Superseded by a new sync");
      saveRun(stale);
    }
    return insertRun(SyncProgress.create(this.userId, kind, this.perPage));
  }

  private async execute(progress: SyncProgress): Promise<ExecuteResult> {
    // Records up to here were merged by an earlier attempt of this run.
    const skipThrough = progress.processed;
    const sequence = this.client.paginate(this.adapter.resource, {
      startPage: progress.cursor.page,
      perPage: progress.cursor.perPage,
    });

    try {
      for await (const { item, page, processed, total } of sequence) {
        progress.cursor.page = page;
        if (this.signal?.aborted) return "cancelled";

        if (progress.total === 0) {
          progress.total = total;
        }
        if (processed <= skipThrough) continue;

        await this.processRecord(progress, item);

        // Pages consumed, not records merged: failed records count too.
        progress.processed = processed;
        saveRun(progress);
        this.onProgress?.(progress);
      }
    } catch (error) {
      progress.cursor.page = sequence.page;
      throw error;
    }

    return "completed";
  }

  private async processRecord(progress: SyncProgress, item: unknown): Promise<void> {
    const { noun } = this.adapter;
    const remoteId = this.adapter.remoteIdOf(item);
    if (remoteId === null) {
      progress.lastError = `Skipped a ${noun} without an id`;
      log.warn("Skipping record without an id", { runId: progress.runId, kind: this.adapter.kind });
      return;
    }

    this.store.markSeen(this.userId, remoteId, progress.runId);

    try {
      const entity = await this.adapter.normalize(item, this.client);
      const outcome = this.store.upsert(this.userId, entity, progress.runId);
      if (outcome === "created") {
        progress.created += 1;
      } else {
        progress.updated += 1;
      }
    } catch (error) {
      if (error instanceof RateLimitedError || isFatalRecordError(error)) throw error;
      progress.lastError = `Error on ${noun} ${remoteId}: ${errorMessage(error)}`;
      log.warn("Record failed, continuing", { runId: progress.runId, remoteId, error: errorMessage(error) });
    }
  }

  private persistAfterError(progress: SyncProgress): void {
    try {
      saveRun(progress);
    } catch (saveError) {
      log.error("Could not record sync run state", { runId: progress.runId, error: errorMessage(saveError) });
    }
  }
}
