import { z } from "zod";
import type { ResourceAdapter } from "@/sync/engine/adapter";
import type { NormalizedRelease } from "@/sync/types";
import { mapRelease, parseCollectionItem, parseReleaseDetail } from "@/sync/discogs/mappers";

const remoteIdSchema = z.object({
  id: z.number().int().optional(),
  basic_information: z.object({ id: z.number().int().optional() }).optional(),
});

/** Collection items, newest additions first, each enriched with its tracklist. */
export function collectionAdapter(username: string): ResourceAdapter<NormalizedRelease> {
  return {
    kind: "collection",
    noun: "release",
    resource: {
      path: `/users/${encodeURIComponent(username)}/collection/folders/0/releases`,
      itemsKey: "releases",
      sort: "added",
      sortOrder: "desc",
    },

    remoteIdOf(raw) {
      const parsed = remoteIdSchema.safeParse(raw);
      if (!parsed.success) return null;
      const id = parsed.data.basic_information?.id ?? parsed.data.id;
      return id === undefined ? null : String(id);
    },

    async normalize(raw, client) {
      const item = parseCollectionItem(raw);
      const detail = parseReleaseDetail(await client.fetchDetail(String(item.basic_information.id)));
      return mapRelease(item, detail);
    },
  };
}
