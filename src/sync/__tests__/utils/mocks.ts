// Test utilities - in-process stand-in for the Discogs API

import { vi } from "vitest";
import type { FakeRelease } from "./fixtures";

type Responder = (url: URL) => Response;

interface Interceptor {
  matches: (url: URL) => boolean;
  respond: Responder;
  once: boolean;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function textResponse(body: string, status: number, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

/**
 * Serves paginated collection and inventory pages, release details and the
 * identity endpoint from in-memory arrays. Install it as the global fetch.
 * Interceptors run first and can inject failures for matching URLs.
 */
export class FakeDiscogs {
  releases: FakeRelease[] = [];
  listings: Array<Record<string, unknown>> = [];
  username = "tester";
  readonly requests: URL[] = [];
  readonly headers: Headers[] = [];
  private interceptors: Interceptor[] = [];

  readonly fetch = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    this.requests.push(url);
    this.headers.push(new Headers(init?.headers));
    return this.handle(url);
  });

  install(): this {
    vi.stubGlobal("fetch", this.fetch);
    return this;
  }

  /** Respond to the next matching request only. */
  once(matches: (url: URL) => boolean, respond: Responder): void {
    this.interceptors.push({ matches, respond, once: true });
  }

  /** Respond to every matching request. */
  always(matches: (url: URL) => boolean, respond: Responder): void {
    this.interceptors.push({ matches, respond, once: false });
  }

  /** Paths of the requests made so far, with the page number for list calls. */
  requestLog(): string[] {
    return this.requests.map((url) => {
      const page = url.searchParams.get("page");
      return page ? `${url.pathname}?page=${page}` : url.pathname;
    });
  }

  private handle(url: URL): Response {
    const interceptor = this.interceptors.find((i) => i.matches(url));
    if (interceptor) {
      if (interceptor.once) {
        this.interceptors = this.interceptors.filter((i) => i !== interceptor);
      }
      return interceptor.respond(url);
    }

    const path = url.pathname;
    if (path === `/users/${this.username}/collection/folders/0/releases`) {
      return this.page(url, "releases", this.releases.map(toCollectionItem));
    }
    if (path === `/users/${this.username}/inventory`) {
      return this.page(url, "listings", this.listings);
    }
    if (path === "/oauth/identity") {
      return jsonResponse({ id: 7, username: this.username, resource_url: "https://api.discogs.com/users/tester" });
    }

    const detail = /^\/releases\/(\d+)$/.exec(path);
    if (detail) {
      const release = this.releases.find((r) => String(r.id) === detail[1]);
      if (release) {
        return jsonResponse({ id: release.id, title: release.title, tracklist: release.tracklist ?? [] });
      }
    }

    return jsonResponse({ message: "Resource not found." }, 404);
  }

  private page(url: URL, key: string, all: unknown[]): Response {
    const page = Number(url.searchParams.get("page") ?? "1");
    const perPage = Number(url.searchParams.get("per_page") ?? "50");
    const pages = Math.max(1, Math.ceil(all.length / perPage));
    const items = all.slice((page - 1) * perPage, page * perPage);
    return jsonResponse({
      pagination: { page, pages, per_page: perPage, items: all.length },
      [key]: items,
    });
  }
}

/** Matches list requests for one page, e.g. `onPage("collection", 2)`. */
export function onPage(path: "collection" | "inventory", page: number): (url: URL) => boolean {
  return (url) => url.pathname.includes(`/${path}`) && url.searchParams.get("page") === String(page);
}

export function onRelease(id: number): (url: URL) => boolean {
  return (url) => url.pathname === `/releases/${id}`;
}

function toCollectionItem(release: FakeRelease): Record<string, unknown> {
  return {
    id: release.id,
    instance_id: release.id * 10,
    date_added: "2024-01-01T00:00:00-08:00",
    basic_information: {
      id: release.id,
      title: release.title,
      year: release.year ?? 0,
      cover_image: "",
      artists: (release.artists ?? ["Test Artist"]).map((name) => ({ name })),
      labels: release.label ? [{ name: release.label, catno: release.catno ?? "" }] : [],
    },
  };
}
