import { SyncService } from "@/sync";
import { DiscogsClient } from "@/sync/discogs/client";
import { discogsCredentialsFromEnv, type SyncEnv } from "@/sync/config/env";
import type { ResourceKind } from "@/sync/types";

/** Configured username, or the token owner's when none is set. */
export async function resolveUsername(env: SyncEnv): Promise<string> {
  if (env.DISCOGS_USERNAME) return env.DISCOGS_USERNAME;
  const client = new DiscogsClient({
    credentials: discogsCredentialsFromEnv(env),
    baseUrl: env.DISCOGS_BASE_URL,
    userAgent: env.DISCOGS_USER_AGENT,
    timeoutMs: env.SYNC_REQUEST_TIMEOUT_MS,
  });
  const identity = await client.getIdentity();
  return identity.username;
}

export function createService(env: SyncEnv, username: string, kind: ResourceKind): SyncService {
  return new SyncService({
    userId: env.SYNC_USER_ID,
    username,
    kind,
    credentials: discogsCredentialsFromEnv(env),
    perPage: env.SYNC_PER_PAGE,
    client: {
      baseUrl: env.DISCOGS_BASE_URL,
      userAgent: env.DISCOGS_USER_AGENT,
      minIntervalMs: env.SYNC_MIN_REQUEST_INTERVAL_MS,
      timeoutMs: env.SYNC_REQUEST_TIMEOUT_MS,
    },
  });
}
