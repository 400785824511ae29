import type { DiscogsCredentials } from "@/sync/types/api";
import { discogsCredentialsSchema } from "@/sync/types/api";
import { AuthFailedError, MalformedRecordError, RateLimitedError, RemoteError, errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { buildOAuthHeader } from "./oauth";
import { RequestThrottle, type Clock } from "./throttle";
import {
  identitySchema,
  pageEnvelopeSchema,
  type DiscogsIdentity,
  type PageCursor,
  type PagedItem,
  type RemotePage,
  type RemoteResource,
} from "./types";

const log = createChildLogger("discogs-client");

const DEFAULT_BASE_URL = "https://api.discogs.com";
const DEFAULT_USER_AGENT = "WaxSync/0.1";
const DEFAULT_RETRY_AFTER_SECONDS = 60;

// Discogs allows 60 req/min authenticated; one per second stays under it.
export const DEFAULT_MIN_INTERVAL_MS = 1000;
export const DEFAULT_TIMEOUT_MS = 10_000;

export interface DiscogsClientOptions {
  credentials: DiscogsCredentials;
  baseUrl?: string;
  userAgent?: string;
  minIntervalMs?: number;
  timeoutMs?: number;
  clock?: Clock;
}

/**
 * Rate-limited Discogs REST client. Build one per sync run: the throttle
 * state belongs to the instance, so separate runs never slow each other down.
 */
export class DiscogsClient {
  private readonly credentials: DiscogsCredentials;
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly throttle: RequestThrottle;

  constructor(options: DiscogsClientOptions) {
    const parsed = discogsCredentialsSchema.safeParse(options.credentials);
    if (!parsed.success) {
      throw new AuthFailedError(parsed.error.issues.map((i) => i.message).join("; "));
    }
    this.credentials = parsed.data;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.throttle = new RequestThrottle(options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS, options.clock);
  }

  /** Make a throttled, authenticated GET and return the decoded JSON body. */
  async request(path: string, params?: Record<string, string | number>): Promise<unknown> {
    await this.throttle.wait();

    const url = new URL(path, this.baseUrl);
    if (params) {
      Object.entries(params).forEach(([k, v]) => {
        url.searchParams.set(k, String(v));
      });
    }

    log.debug("Discogs API request", { path, params });

    let response: Response;
    try {
      response = await fetch(url.toString(), {
        headers: {
          Authorization: this.authorizationFor("GET", url.toString()),
          "User-Agent": this.userAgent,
          Accept: "application/vnd.discogs.v2.discogs+json",
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new RemoteError(0, `Request timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw new RemoteError(0, errorMessage(error), { cause: error });
    }

    if (response.status === 429) {
      const retryAfter = parseRetryAfter(response.headers.get("Retry-After"));
      log.warn("Discogs rate limited", { path, retryAfter });
      throw new RateLimitedError(retryAfter);
    }

    if (response.status === 401) {
      throw new AuthFailedError("Invalid or expired Discogs credentials");
    }

    if (response.status === 403) {
      throw new AuthFailedError("Access forbidden - check Discogs token permissions");
    }

    if (!response.ok) {
      const body = await response.text();
      throw new RemoteError(response.status, body);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new RemoteError(response.status, `Invalid JSON body: ${errorMessage(error)}`, { cause: error });
    }
  }

  async getIdentity(): Promise<DiscogsIdentity> {
    const body = await this.request("/oauth/identity");
    const parsed = identitySchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedRecordError("identity response", parsed.error.message);
    }
    return parsed.data;
  }

  async fetchPage(resource: RemoteResource, cursor: PageCursor): Promise<RemotePage> {
    const params: Record<string, string | number> = {
      page: cursor.page,
      per_page: cursor.perPage,
    };
    if (resource.sort) params.sort = resource.sort;
    if (resource.sortOrder) params.sort_order = resource.sortOrder;

    const body = await this.request(resource.path, params);
    const envelope = pageEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new MalformedRecordError(`page ${cursor.page} of ${resource.path}`, envelope.error.message);
    }

    const rawItems = envelope.data[resource.itemsKey];
    const items: unknown[] = Array.isArray(rawItems) ? rawItems : [];
    const { pagination } = envelope.data;

    return {
      items,
      page: pagination.page ?? cursor.page,
      pages: pagination.pages,
      totalCount: pagination.items,
    };
  }

  /** Full release record, including the tracklist the collection endpoint omits. */
  async fetchDetail(remoteId: string): Promise<unknown> {
    return this.request(`/releases/${encodeURIComponent(remoteId)}`);
  }

  paginate(resource: RemoteResource, options: { startPage?: number; perPage?: number } = {}): PagedSequence {
    return new PagedSequence(this, resource, options.startPage ?? 1, options.perPage ?? 100);
  }

  private authorizationFor(method: string, url: string): string {
    if (this.credentials.oauth) {
      return buildOAuthHeader(method, url, this.credentials.oauth);
    }
    return `Discogs token=${this.credentials.personalToken ?? ""}`;
  }
}

/**
 * Lazy, restartable walk over a paginated resource. `page` always names the
 * page currently being read (or about to be fetched), so a caller that is
 * interrupted can persist it and restart from there.
 */
export class PagedSequence implements AsyncIterable<PagedItem> {
  page: number;

  constructor(
    private readonly client: DiscogsClient,
    private readonly resource: RemoteResource,
    readonly startPage: number,
    readonly perPage: number,
  ) {
    this.page = startPage;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<PagedItem> {
    this.page = this.startPage;
    let processed = (this.startPage - 1) * this.perPage;
    let total: number | null = null;

    while (true) {
      const response = await this.client.fetchPage(this.resource, { page: this.page, perPage: this.perPage });

      if (total === null) {
        total = response.totalCount;
      }

      if (response.items.length === 0) break;

      for (const item of response.items) {
        processed += 1;
        yield { item, page: this.page, processed, total };
      }

      if (this.page >= response.pages) break;
      this.page += 1;
    }
  }
}

function parseRetryAfter(header: string | null): number {
  const seconds = parseInt(header ?? "", 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : DEFAULT_RETRY_AFTER_SECONDS;
}
