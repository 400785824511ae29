// Raw response shapes from the Discogs REST API
// Docs: https://www.discogs.com/developers
//
// Only the fields the engine reads are declared; zod strips the rest.

import { z } from "zod";

export const paginationSchema = z.object({
  page: z.number().int().optional(),
  pages: z.number().int().default(1),
  items: z.number().int().default(0),
  per_page: z.number().int().optional(),
});

export const pageEnvelopeSchema = z
  .object({
    pagination: paginationSchema.default({}),
  })
  .passthrough();

const namedSchema = z.object({
  name: z.string().default(""),
});

export const collectionItemSchema = z.object({
  id: z.number().int().optional(),
  instance_id: z.number().int().optional(),
  date_added: z.string().optional(),
  basic_information: z.object({
    id: z.number().int(),
    title: z.string().optional(),
    year: z.number().int().nullable().optional(),
    cover_image: z.string().nullable().optional(),
    artists: z.array(namedSchema).default([]),
    labels: z
      .array(namedSchema.extend({ catno: z.string().optional() }))
      .default([]),
  }),
});

export const tracklistEntrySchema = z.object({
  position: z.string().default(""),
  title: z.string().optional(),
  duration: z.string().optional(),
  type_: z.string().optional(),
});

export const releaseDetailSchema = z.object({
  id: z.number().int(),
  tracklist: z.array(tracklistEntrySchema).default([]),
});

export const listingSchema = z.object({
  id: z.number().int(),
  status: z.string().optional(),
  condition: z.string().nullable().optional(),
  sleeve_condition: z.string().nullable().optional(),
  price: z
    .object({
      value: z.number(),
      currency: z.string(),
    })
    .nullable()
    .optional(),
  location: z.string().nullable().optional(),
  comments: z.string().nullable().optional(),
  posted: z.string().optional(),
  release: z.object({
    id: z.number().int(),
    title: z.string().optional(),
    artist: z.string().optional(),
    description: z.string().optional(),
  }),
});

export const identitySchema = z.object({
  id: z.number().int(),
  username: z.string(),
});

export type DiscogsPagination = z.infer<typeof paginationSchema>;
export type DiscogsCollectionItem = z.infer<typeof collectionItemSchema>;
export type DiscogsTracklistEntry = z.infer<typeof tracklistEntrySchema>;
export type DiscogsReleaseDetail = z.infer<typeof releaseDetailSchema>;
export type DiscogsListing = z.infer<typeof listingSchema>;
export type DiscogsIdentity = z.infer<typeof identitySchema>;

/** A paginated list endpoint and the key its items live under. */
export interface RemoteResource {
  path: string;
  itemsKey: string;
  sort?: string;
  sortOrder?: "asc" | "desc";
}

export interface PageCursor {
  page: number;
  perPage: number;
}

export interface RemotePage {
  items: unknown[];
  page: number;
  pages: number;
  totalCount: number;
}

export interface PagedItem {
  item: unknown;
  page: number;
  processed: number;
  total: number;
}
