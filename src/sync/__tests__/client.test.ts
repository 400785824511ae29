import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { DiscogsClient } from "@/sync/discogs/client";
import { AuthFailedError, RateLimitedError, RemoteError } from "@/sync/errors";
import type { RemoteResource } from "@/sync/discogs/types";
import { FakeDiscogs, jsonResponse, onPage, onRelease, textResponse } from "./utils/mocks";
import { releases, testCredentials } from "./utils/fixtures";

const collection: RemoteResource = {
  path: "/users/tester/collection/folders/0/releases",
  itemsKey: "releases",
  sort: "added",
  sortOrder: "desc",
};

describe("DiscogsClient", () => {
  let fake: FakeDiscogs;
  let client: DiscogsClient;

  beforeEach(() => {
    fake = new FakeDiscogs().install();
    client = new DiscogsClient({ credentials: testCredentials, minIntervalMs: 0 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("credentials", () => {
    it("rejects missing credentials before any request", () => {
      expect(() => new DiscogsClient({ credentials: {} })).toThrow(AuthFailedError);
      expect(() => new DiscogsClient({ credentials: {} })).toThrow(
        "Provide exactly one of a personal access token or OAuth credentials",
      );
      expect(fake.fetch).not.toHaveBeenCalled();
    });

    it("rejects a token and OAuth together", () => {
      const credentials = {
        personalToken: "test-token",
        oauth: { consumerKey: "ck", consumerSecret: "cs", token: "tk", tokenSecret: "ts" },
      };
      expect(() => new DiscogsClient({ credentials })).toThrow(AuthFailedError);
    });

    it("sends the personal token, user agent and accept headers", async () => {
      await client.getIdentity();

      const headers = fake.headers[0];
      expect(headers.get("Authorization")).toBe("Discogs token=test-token");
      expect(headers.get("User-Agent")).toBe("WaxSync/0.1");
      expect(headers.get("Accept")).toBe("application/vnd.discogs.v2.discogs+json");
    });

    it("signs requests when OAuth credentials are given", async () => {
      const oauthClient = new DiscogsClient({
        credentials: { oauth: { consumerKey: "ck", consumerSecret: "cs", token: "tk", tokenSecret: "ts" } },
        minIntervalMs: 0,
      });

      await oauthClient.getIdentity();

      expect(fake.headers[0].get("Authorization")).toMatch(/^OAuth oauth_consumer_key="ck", /);
    });
  });

  describe("response classification", () => {
    it("maps 429 to RateLimitedError with the Retry-After value", async () => {
      fake.once(onRelease(42), () => textResponse("slow down", 429, { "Retry-After": "30" }));

      const error = await client.fetchDetail("42").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error).toMatchObject({ retryAfterSeconds: 30, code: "RATE_LIMITED" });
    });

    it("defaults the retry delay to 60 seconds", async () => {
      fake.once(onRelease(42), () => textResponse("slow down", 429));

      await expect(client.fetchDetail("42")).rejects.toMatchObject({ retryAfterSeconds: 60 });
    });

    it("maps 401 and 403 to AuthFailedError", async () => {
      fake.once(onRelease(1), () => textResponse("", 401));
      fake.once(onRelease(2), () => textResponse("", 403));

      await expect(client.fetchDetail("1")).rejects.toThrow("Invalid or expired Discogs credentials");
      await expect(client.fetchDetail("2")).rejects.toThrow("Access forbidden - check Discogs token permissions");
    });

    it("maps other failures to RemoteError with status and body", async () => {
      fake.once(onRelease(42), () => textResponse("boom", 500));

      const error = await client.fetchDetail("42").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteError);
      expect(error).toMatchObject({ status: 500, body: "boom", message: "Discogs API error 500: boom" });
    });

    it("reports a timeout as a RemoteError without a status", async () => {
      const timeout = new Error("The operation was aborted due to timeout");
      timeout.name = "TimeoutError";
      fake.fetch.mockRejectedValueOnce(timeout);

      await expect(client.fetchDetail("42")).rejects.toMatchObject({
        status: 0,
        message: "Discogs request failed: Request timed out after 10000ms",
      });
    });
  });

  describe("pagination", () => {
    it("requests a page with sort parameters", async () => {
      fake.releases = releases(1, 2, 3);

      const page = await client.fetchPage(collection, { page: 2, perPage: 2 });

      const url = fake.requests[0];
      expect(url.searchParams.get("page")).toBe("2");
      expect(url.searchParams.get("per_page")).toBe("2");
      expect(url.searchParams.get("sort")).toBe("added");
      expect(url.searchParams.get("sort_order")).toBe("desc");
      expect(page).toMatchObject({ page: 2, pages: 2, totalCount: 3 });
      expect(page.items).toHaveLength(1);
    });

    it("walks every page lazily", async () => {
      fake.releases = releases(1, 2, 3);
      const seen: Array<{ page: number; processed: number; total: number }> = [];

      for await (const { page, processed, total } of client.paginate(collection, { perPage: 2 })) {
        seen.push({ page, processed, total });
      }

      expect(seen).toEqual([
        { page: 1, processed: 1, total: 3 },
        { page: 1, processed: 2, total: 3 },
        { page: 2, processed: 3, total: 3 },
      ]);
      expect(fake.requests).toHaveLength(2);
    });

    it("starts from a later page with processed offset", async () => {
      fake.releases = releases(1, 2, 3);
      const sequence = client.paginate(collection, { startPage: 2, perPage: 2 });
      const processed: number[] = [];

      for await (const item of sequence) {
        processed.push(item.processed);
      }

      expect(processed).toEqual([3]);
      expect(fake.requestLog()).toEqual(["/users/tester/collection/folders/0/releases?page=2"]);
    });

    it("stops on an empty page", async () => {
      fake.once(onPage("collection", 1), () =>
        jsonResponse({ pagination: { page: 1, pages: 5, items: 0 }, releases: [] }),
      );

      const items: unknown[] = [];
      for await (const { item } of client.paginate(collection)) {
        items.push(item);
      }

      expect(items).toEqual([]);
      expect(fake.requests).toHaveLength(1);
    });

    it("leaves the sequence on the page that failed", async () => {
      fake.releases = releases(1, 2, 3);
      fake.once(onPage("collection", 2), () => textResponse("", 429, { "Retry-After": "5" }));
      const sequence = client.paginate(collection, { perPage: 2 });

      const consume = async () => {
        for await (const _ of sequence) {
          // drain
        }
      };

      await expect(consume()).rejects.toBeInstanceOf(RateLimitedError);
      expect(sequence.page).toBe(2);
    });
  });

  it("looks up the token owner", async () => {
    await expect(client.getIdentity()).resolves.toEqual({ id: 7, username: "tester" });
  });
});
