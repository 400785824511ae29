import { z } from "zod";
import type { ResourceAdapter } from "@/sync/engine/adapter";
import type { NormalizedListing } from "@/sync/types";
import { mapListing, parseListing } from "@/sync/discogs/mappers";

const remoteIdSchema = z.object({ id: z.number().int() });

/** Marketplace listings, most recently listed first. No detail call needed. */
export function inventoryAdapter(username: string): ResourceAdapter<NormalizedListing> {
  return {
    kind: "inventory",
    noun: "listing",
    resource: {
      path: `/users/${encodeURIComponent(username)}/inventory`,
      itemsKey: "listings",
      sort: "listed",
      sortOrder: "desc",
    },

    remoteIdOf(raw) {
      const parsed = remoteIdSchema.safeParse(raw);
      return parsed.success ? String(parsed.data.id) : null;
    },

    async normalize(raw) {
      return mapListing(parseListing(raw));
    },
  };
}
