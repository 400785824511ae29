import type { ResourceKind } from "@/sync/types";
import { errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("sync-guard");

export type SyncTask<T = unknown> = (signal: AbortSignal) => Promise<T>;

interface SyncHandle {
  controller: AbortController;
  settled: Promise<void>;
  done: boolean;
}

/**
 * Single-flight background runner keyed by (user, resource kind). A second
 * start while one is live is refused, never queued. Entries are evicted as
 * soon as their task settles.
 */
export class SyncGuard {
  private readonly handles = new Map<string, SyncHandle>();

  /** Test-and-set: returns false without starting anything if a run is live. */
  tryStart(userId: number, kind: ResourceKind, task: SyncTask): boolean {
    return this.launch(userId, kind, task) !== undefined;
  }

  /**
   * Like tryStart, but hands back the task's own promise for callers that
   * await the run. Undefined when a run is already live.
   */
  launch<T>(userId: number, kind: ResourceKind, task: SyncTask<T>): Promise<T> | undefined {
    const key = keyOf(userId, kind);
    const current = this.handles.get(key);
    if (current && !current.done) {
      return undefined;
    }

    const controller = new AbortController();
    const handle: SyncHandle = { controller, settled: Promise.resolve(), done: false };

    // Invoked synchronously so the caller can hold on to the task's own promise.
    let running: Promise<T>;
    try {
      running = task(controller.signal);
    } catch (error) {
      running = Promise.reject(error);
    }

    handle.settled = running
      .then(
        () => undefined,
        (error: unknown) => {
          // The run's own state already records the failure.
          log.error("Sync task ended with an error", { userId, kind, error: errorMessage(error) });
        },
      )
      .finally(() => {
        handle.done = true;
        if (this.handles.get(key) === handle) {
          this.handles.delete(key);
        }
      });

    this.handles.set(key, handle);
    log.info("Sync task started", { userId, kind });
    return running;
  }

  isRunning(userId: number, kind: ResourceKind): boolean {
    const handle = this.handles.get(keyOf(userId, kind));
    return handle !== undefined && !handle.done;
  }

  /** Ask a live run to pause at its next record. False if nothing is running. */
  cancel(userId: number, kind: ResourceKind): boolean {
    const handle = this.handles.get(keyOf(userId, kind));
    if (!handle || handle.done) return false;
    handle.controller.abort();
    log.info("Background sync cancellation requested", { userId, kind });
    return true;
  }

  /** Resolves once the live run (if any) has finished. */
  async whenSettled(userId: number, kind: ResourceKind): Promise<void> {
    await this.handles.get(keyOf(userId, kind))?.settled;
  }

  get size(): number {
    return this.handles.size;
  }
}

function keyOf(userId: number, kind: ResourceKind): string {
  return `${userId}:${kind}`;
}

/** Process-wide guard shared by every SyncService. */
export const syncGuard = new SyncGuard();
