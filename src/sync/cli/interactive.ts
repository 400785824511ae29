import * as p from "@clack/prompts";
import { createService, resolveUsername } from "./setup";
import type { SyncService, SyncStatusView } from "@/sync";
import { RateLimitedError, errorMessage } from "@/sync/errors";
import type { SyncEnv } from "@/sync/config/env";
import { closeDatabase } from "@/sync/ledger/db";
import { RESOURCE_KINDS, type ResourceKind } from "@/sync/types";

const KIND_LABELS: Record<ResourceKind, string> = {
  collection: "Collection (releases and tracklists)",
  inventory: "Marketplace inventory (listings)",
};

function formatSummary(status: SyncStatusView): string {
  return `${status.added} new, ${status.updated} updated, ${status.removed} removed`;
}

async function chooseResume(service: SyncService): Promise<boolean | symbol> {
  const status = service.getStatus();
  if (!status.canResume) return false;

  p.log.info(`${status.message} (${status.processed} of ${status.total} done).`);
  return p.confirm({
    message: "Resume where the last sync stopped?",
    initialValue: true,
  });
}

export async function runInteractiveSync(env: SyncEnv): Promise<void> {
  p.intro("Wax Sync");

  const choice = await p.select({
    message: "What would you like to sync?",
    options: RESOURCE_KINDS.map((k) => ({ value: k, label: KIND_LABELS[k] })),
  });
  if (p.isCancel(choice)) {
    p.outro("Sync cancelled.");
    return;
  }
  const kind = RESOURCE_KINDS.find((k) => k === choice) ?? "collection";

  let service: SyncService;
  try {
    service = createService(env, await resolveUsername(env), kind);
  } catch (error) {
    p.log.error(errorMessage(error));
    p.outro("Set up your .env.local file and try again.");
    return;
  }

  const resume = await chooseResume(service);
  if (p.isCancel(resume)) {
    p.outro("Sync cancelled.");
    closeDatabase();
    return;
  }

  const syncSpinner = p.spinner();
  syncSpinner.start("Syncing...");

  try {
    await service.runSync(resume, (progress) => {
      syncSpinner.message(`Syncing... ${progress.processed} of ${progress.total}`);
    });
    const status = service.getStatus();
    syncSpinner.stop("Sync finished.");

    if (status.lastError) {
      p.log.warn(`${formatSummary(status)}. Last problem: ${status.lastError}`);
    } else {
      p.log.success(formatSummary(status));
    }
  } catch (error) {
    if (error instanceof RateLimitedError) {
      syncSpinner.stop("Sync paused.");
      p.log.warn(`Discogs asked us to slow down. Run again with resume in ${error.retryAfterSeconds}s.`);
    } else {
      syncSpinner.stop("Sync failed.");
      p.log.error(errorMessage(error));
    }
  }

  closeDatabase();
  p.outro("Done!");
}
