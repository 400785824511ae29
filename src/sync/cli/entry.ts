import { config } from "dotenv";
import { runInteractiveSync } from "./interactive";
import { createService, resolveUsername } from "./setup";
import { getEnv } from "@/sync/config/env";
import { closeDatabase } from "@/sync/ledger/db";
import { errorMessage, isSyncError } from "@/sync/errors";
import { setLogLevel } from "@/sync/logger";
import { syncRequestSchema } from "@/sync/types/api";

config({ path: ".env.local" });

const args = process.argv.slice(2);
const isAuto = args.includes("--auto");
const resume = args.includes("--resume");
const showStatus = args.includes("--status");
const showHistory = args.includes("--history");

function argValue(name: string): string | undefined {
  const inline = args.find((a) => a.startsWith(`${name}=`));
  if (inline) return inline.slice(name.length + 1);
  const index = args.indexOf(name);
  return index >= 0 ? args[index + 1] : undefined;
}

async function main() {
  const env = getEnv();
  setLogLevel(env.SYNC_LOG_LEVEL);

  if (!isAuto && !showStatus && !showHistory) {
    // Interactive mode with prompts
    await runInteractiveSync(env);
    return;
  }

  const request = syncRequestSchema.parse({
    userId: env.SYNC_USER_ID,
    username: await resolveUsername(env),
    kind: argValue("--kind") ?? "collection",
    resume,
  });
  const service = createService(env, request.username, request.kind);

  if (showHistory) {
    console.log(JSON.stringify(service.getHistory(), null, 2));
  } else if (showStatus) {
    console.log(JSON.stringify(service.getStatus(), null, 2));
  } else {
    // Headless: one run, then the final status as JSON
    try {
      await service.runSync(request.resume);
    } finally {
      console.log(JSON.stringify(service.getStatus(), null, 2));
    }
  }
  closeDatabase();
}

main().catch((err: unknown) => {
  if (isSyncError(err)) {
    console.error(`Sync failed (${err.code}):`, err.message);
  } else {
    console.error("Sync failed:", errorMessage(err));
  }
  closeDatabase();
  process.exit(1);
});
