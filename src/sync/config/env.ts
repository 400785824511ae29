import { z } from "zod";
import type { DiscogsCredentials } from "@/sync/types/api";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined));

const envSchema = z.object({
  DISCOGS_USERNAME: optionalString,

  // Personal access token mode
  DISCOGS_USER_TOKEN: optionalString,

  // OAuth 1.0a mode: all four are needed together
  DISCOGS_CONSUMER_KEY: optionalString,
  DISCOGS_CONSUMER_SECRET: optionalString,
  DISCOGS_OAUTH_TOKEN: optionalString,
  DISCOGS_OAUTH_TOKEN_SECRET: optionalString,

  DISCOGS_USER_AGENT: optionalString,
  DISCOGS_BASE_URL: z.string().url().optional(),

  SYNC_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info"),
  SYNC_DB_PATH: z
    .string()
    .default("./wax_sync.db"),
  SYNC_USER_ID: z.coerce.number().int().positive().default(1),
  SYNC_PER_PAGE: z.coerce.number().int().min(1).max(100).default(100),
  SYNC_MIN_REQUEST_INTERVAL_MS: z.coerce.number().int().min(0).default(1000),
  SYNC_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type SyncEnv = z.infer<typeof envSchema>;

let _env: SyncEnv | null = null;

export function getEnv(): SyncEnv {
  if (!_env) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const missing = result.error.issues
        .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
        .join("\n");
      throw new Error(
        `Sync environment validation failed:\n${missing}\n\nCopy .env.example to .env.local and fill in the values.`
      );
    }
    _env = result.data;
  }
  return _env;
}

/** Drop the cached env so the next getEnv() re-reads process.env. */
export function resetEnv(): void {
  _env = null;
}

/**
 * Credentials from the environment. A personal token wins; otherwise any
 * OAuth variable selects OAuth and the client reports whichever are missing.
 */
export function discogsCredentialsFromEnv(env: SyncEnv): DiscogsCredentials {
  if (env.DISCOGS_USER_TOKEN) {
    return { personalToken: env.DISCOGS_USER_TOKEN };
  }
  const oauthVars = [
    env.DISCOGS_CONSUMER_KEY,
    env.DISCOGS_CONSUMER_SECRET,
    env.DISCOGS_OAUTH_TOKEN,
    env.DISCOGS_OAUTH_TOKEN_SECRET,
  ];
  if (oauthVars.some((v) => v !== undefined)) {
    return {
      oauth: {
        consumerKey: env.DISCOGS_CONSUMER_KEY ?? "",
        consumerSecret: env.DISCOGS_CONSUMER_SECRET ?? "",
        token: env.DISCOGS_OAUTH_TOKEN ?? "",
        tokenSecret: env.DISCOGS_OAUTH_TOKEN_SECRET ?? "",
      },
    };
  }
  return {};
}
