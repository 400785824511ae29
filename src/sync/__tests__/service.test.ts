import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { SyncService, type SyncStatusView } from "@/sync";
import { SyncGuard } from "@/sync/engine/guard";
import { AuthFailedError, RateLimitedError, SyncInProgressError } from "@/sync/errors";
import { closeDatabase } from "@/sync/ledger/db";
import { insertRun } from "@/sync/ledger/repository";
import { SyncProgress } from "@/sync/engine/progress";
import type { ResourceKind } from "@/sync/types";
import { FakeDiscogs, onPage, onRelease, textResponse } from "./utils/mocks";
import { listing, releases, testCredentials } from "./utils/fixtures";

describe("SyncService", () => {
  let fake: FakeDiscogs;
  let guard: SyncGuard;

  function service(kind: ResourceKind = "collection", credentials = testCredentials) {
    return new SyncService({
      userId: 1,
      username: "tester",
      kind,
      credentials,
      guard,
      perPage: 2,
      client: { minIntervalMs: 0 },
    });
  }

  beforeEach(() => {
    fake = new FakeDiscogs().install();
    guard = new SyncGuard();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    closeDatabase();
  });

  it("reports a kind that was never synced", () => {
    expect(service("inventory").getStatus()).toEqual({
      status: "never_synced",
      message: "Inventory not synced yet",
      progressPercent: 0,
      processed: 0,
      total: 0,
      added: 0,
      updated: 0,
      removed: 0,
      startedAt: null,
      completedAt: null,
      lastError: null,
      canSync: true,
      canResume: false,
    });
  });

  it("runs in the foreground and summarises the result", async () => {
    fake.releases = releases(1, 2);
    const sync = service();

    await sync.runSync();

    expect(sync.getStatus()).toMatchObject({
      status: "completed",
      message: "Last sync completed. 2 new, 0 updated, 0 removed.",
      progressPercent: 100,
      processed: 2,
      total: 2,
      added: 2,
      canSync: true,
      canResume: false,
    });
  });

  it("shows live progress while running", async () => {
    fake.releases = releases(1, 2);
    const sync = service();
    const seen: SyncStatusView[] = [];

    await sync.runSync(false, () => {
      seen.push(sync.getStatus());
    });

    expect(seen[0]).toMatchObject({
      status: "running",
      message: "Syncing... 1 of 2 releases",
      progressPercent: 50,
      canSync: false,
    });
  });

  it("runs one background sync at a time", async () => {
    fake.listings = [listing(900, 42)];
    const sync = service("inventory");

    expect(sync.startSync()).toBe(true);
    expect(sync.startSync()).toBe(false);
    await expect(sync.runSync()).rejects.toBeInstanceOf(SyncInProgressError);

    await guard.whenSettled(1, "inventory");

    expect(sync.isRunning()).toBe(false);
    expect(sync.getStatus().message).toBe("Last sync completed. 1 new, 0 updated, 0 removed.");
  });

  it("refuses bad credentials before recording a run", () => {
    const sync = service("collection", { personalToken: "" });

    expect(() => sync.startSync()).toThrow(AuthFailedError);
    expect(sync.getStatus().status).toBe("never_synced");
    expect(sync.isRunning()).toBe(false);
  });

  it("reports a paused run after a rate limit", async () => {
    fake.releases = releases(1, 2, 3);
    fake.once(onPage("collection", 2), () => textResponse("", 429, { "Retry-After": "30" }));
    const sync = service();

    await expect(sync.runSync()).rejects.toBeInstanceOf(RateLimitedError);

    expect(sync.getStatus()).toMatchObject({
      status: "paused",
      message: "Sync paused - can be resumed",
      lastError: "Rate limited. Retry after 30s",
      canResume: true,
    });

    await sync.runSync(true);
    expect(sync.getStatus()).toMatchObject({ status: "completed", added: 3 });
  });

  it("reports a failed run", async () => {
    fake.releases = releases(1);
    fake.once(onRelease(1), () => textResponse("", 401));
    const sync = service();

    await expect(sync.runSync()).rejects.toBeInstanceOf(AuthFailedError);

    expect(sync.getStatus()).toMatchObject({
      status: "failed",
      message: "Sync failed: Invalid or expired Discogs credentials",
      canResume: true,
    });
  });

  it("pauses a background run on cancel", async () => {
    fake.releases = releases(1, 2, 3);
    const sync = service();

    sync.startSync();
    expect(sync.cancelSync()).toBe(true);
    await guard.whenSettled(1, "collection");

    expect(sync.getStatus()).toMatchObject({ status: "paused", processed: 0, canResume: true });
    expect(sync.cancelSync()).toBe(false);
  });

  it("offers to resume a run left running by a crashed process", async () => {
    fake.releases = releases(1, 2);
    const stale = SyncProgress.create(1, "collection", 2);
    stale.start();
    insertRun(stale);
    const sync = service();

    expect(sync.getStatus()).toMatchObject({
      status: "running",
      message: "Sync interrupted - can be resumed",
      canSync: true,
      canResume: true,
    });

    const resumed = await sync.runSync(true);

    expect(resumed.runId).toBe(stale.runId);
    expect(sync.getStatus()).toMatchObject({ status: "completed", added: 2, canResume: false });
  });

  it("lists history newest first", async () => {
    fake.releases = releases(1);
    const sync = service();

    const first = await sync.runSync();
    const second = await sync.runSync();
    const third = await sync.runSync();

    expect(sync.getHistory().map((r) => r.runId)).toEqual([third.runId, second.runId, first.runId]);
    expect(sync.getHistory(1)).toHaveLength(1);
  });
});
