import type { NormalizedListing, NormalizedRelease, ResourceKind } from "@/sync/types";
import type { DiscogsCredentials } from "@/sync/types/api";
import { DiscogsClient, type DiscogsClientOptions } from "@/sync/discogs/client";
import { SyncInProgressError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { findLatestRun, listRuns } from "@/sync/ledger/repository";
import { collectionAdapter } from "@/sync/collection/adapter";
import { releaseStore } from "@/sync/collection/store";
import { inventoryAdapter } from "@/sync/inventory/adapter";
import { listingStore } from "@/sync/inventory/store";
import { SyncOrchestrator } from "@/sync/engine/orchestrator";
import { SyncGuard, syncGuard } from "@/sync/engine/guard";
import type { SyncProgress, SyncStatus } from "@/sync/engine/progress";

const log = createChildLogger("sync-service");

const NOUNS: Record<ResourceKind, string> = {
  collection: "release",
  inventory: "listing",
};

export interface SyncServiceOptions {
  userId: number;
  username: string;
  credentials: DiscogsCredentials;
  kind: ResourceKind;
  guard?: SyncGuard;
  /** Everything but credentials; a fresh client is built for each run. */
  client?: Omit<DiscogsClientOptions, "credentials">;
  perPage?: number;
}

export interface SyncStatusView {
  status: SyncStatus | "never_synced";
  message: string;
  progressPercent: number;
  processed: number;
  total: number;
  added: number;
  updated: number;
  removed: number;
  startedAt: string | null;
  completedAt: string | null;
  lastError: string | null;
  canSync: boolean;
  canResume: boolean;
}

export type ProgressListener = (progress: SyncProgress) => void;

/**
 * Inbound facade over one user's collection or inventory syncs. The guard
 * keeps at most one live run per user and kind.
 */
export class SyncService {
  private readonly userId: number;
  private readonly username: string;
  private readonly credentials: DiscogsCredentials;
  private readonly kind: ResourceKind;
  private readonly guard: SyncGuard;
  private readonly clientOptions: Omit<DiscogsClientOptions, "credentials">;
  private readonly perPage?: number;

  constructor(options: SyncServiceOptions) {
    this.userId = options.userId;
    this.username = options.username;
    this.credentials = options.credentials;
    this.kind = options.kind;
    this.guard = options.guard ?? syncGuard;
    this.clientOptions = options.client ?? {};
    this.perPage = options.perPage;
  }

  /**
   * Start a run in the background. Returns false when one is already live.
   * Bad credentials throw here, before any run is recorded.
   */
  startSync(resume = false, onProgress?: ProgressListener): boolean {
    const client = this.createClient();
    const started = this.guard.tryStart(this.userId, this.kind, (signal) =>
      this.createOrchestrator(client, signal, onProgress).run(resume),
    );
    if (!started) {
      log.info("Sync already running", { userId: this.userId, kind: this.kind });
    }
    return started;
  }

  /** Same run, awaited in the foreground. */
  async runSync(resume = false, onProgress?: ProgressListener): Promise<SyncProgress> {
    const client = this.createClient();
    const run = this.guard.launch(this.userId, this.kind, (signal) =>
      this.createOrchestrator(client, signal, onProgress).run(resume),
    );
    if (!run) {
      throw new SyncInProgressError(this.kind);
    }
    return run;
  }

  /** Ask the live run to pause at its next record. */
  cancelSync(): boolean {
    return this.guard.cancel(this.userId, this.kind);
  }

  isRunning(): boolean {
    return this.guard.isRunning(this.userId, this.kind);
  }

  getStatus(): SyncStatusView {
    const latest = findLatestRun(this.userId, this.kind);
    const live = this.isRunning();
    const canSync = !live;

    if (!latest) {
      return {
        status: "never_synced",
        message: `${capitalize(this.kind)} not synced yet`,
        progressPercent: 0,
        processed: 0,
        total: 0,
        added: 0,
        updated: 0,
        removed: 0,
        startedAt: null,
        completedAt: null,
        lastError: null,
        canSync,
        canResume: false,
      };
    }

    // A run left "running" with nothing live behind it was cut off by a crash.
    const interrupted = latest.status === "running" && !live;

    return {
      status: latest.status,
      message: interrupted ? "Sync interrupted - can be resumed" : statusMessage(latest, NOUNS[this.kind]),
      progressPercent: latest.progressPercent,
      processed: latest.processed,
      total: latest.total,
      added: latest.created,
      updated: latest.updated,
      removed: latest.removed,
      startedAt: latest.startedAt,
      completedAt: latest.completedAt,
      lastError: latest.lastError,
      canSync,
      canResume: latest.canResume || interrupted,
    };
  }

  /** Newest first. */
  getHistory(limit = 10): SyncProgress[] {
    return listRuns(this.userId, this.kind, limit);
  }

  private createClient(): DiscogsClient {
    return new DiscogsClient({ ...this.clientOptions, credentials: this.credentials });
  }

  private createOrchestrator(
    client: DiscogsClient,
    signal: AbortSignal,
    onProgress?: ProgressListener,
  ): SyncOrchestrator<NormalizedRelease> | SyncOrchestrator<NormalizedListing> {
    const base = { userId: this.userId, client, perPage: this.perPage, signal, onProgress };
    switch (this.kind) {
      case "collection":
        return new SyncOrchestrator({ ...base, adapter: collectionAdapter(this.username), store: releaseStore });
      case "inventory":
        return new SyncOrchestrator({ ...base, adapter: inventoryAdapter(this.username), store: listingStore });
    }
  }
}

function statusMessage(progress: SyncProgress, noun: string): string {
  switch (progress.status) {
    case "running":
      return `Syncing... ${progress.processed} of ${progress.total} ${noun}s`;
    case "paused":
      return "Sync paused - can be resumed";
    case "completed":
      return `Last sync completed. ${progress.created} new, ${progress.updated} updated, ${progress.removed} removed.`;
    case "failed":
      return `Sync failed: ${progress.lastError ?? "Unknown error"}`;
    case "pending":
      return "Ready to sync";
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export { DiscogsClient, PagedSequence } from "@/sync/discogs/client";
export { SyncOrchestrator } from "@/sync/engine/orchestrator";
export { SyncGuard, syncGuard } from "@/sync/engine/guard";
export { SyncProgress } from "@/sync/engine/progress";
export { planTrackMerge } from "@/sync/engine/merge";
export type { EntityStore, UpsertOutcome } from "@/sync/engine/merge";
export type { ResourceAdapter } from "@/sync/engine/adapter";
export { collectionAdapter } from "@/sync/collection/adapter";
export { releaseStore, findRelease, listReleases, listTracks } from "@/sync/collection/store";
export { inventoryAdapter } from "@/sync/inventory/adapter";
export {
  listingStore,
  findListing,
  listListings,
  listListingsNeedingAttention,
  dismissListingNotification,
} from "@/sync/inventory/store";
export * from "@/sync/errors";
export type * from "@/sync/types";
