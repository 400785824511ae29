import type { NormalizedListing, NormalizedRelease, NormalizedTrack } from "@/sync/types";
import { MalformedRecordError } from "@/sync/errors";
import {
  collectionItemSchema,
  listingSchema,
  releaseDetailSchema,
  type DiscogsCollectionItem,
  type DiscogsListing,
  type DiscogsReleaseDetail,
} from "./types";

const SKIPPED_TRACK_TYPES = new Set(["heading", "index"]);

export function parseCollectionItem(raw: unknown): DiscogsCollectionItem {
  const parsed = collectionItemSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedRecordError("collection item", parsed.error.message);
  }
  return parsed.data;
}

export function parseReleaseDetail(raw: unknown): DiscogsReleaseDetail {
  const parsed = releaseDetailSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedRecordError("release detail", parsed.error.message);
  }
  return parsed.data;
}

export function parseListing(raw: unknown): DiscogsListing {
  const parsed = listingSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedRecordError("inventory listing", parsed.error.message);
  }
  return parsed.data;
}

/** Discogs disambiguates same-named artists as "Name (2)"; drop the suffix. */
export function cleanArtistName(name: string): string {
  return name.replace(/\s*\(\d+\)$/, "");
}

export function mapTracklist(detail: DiscogsReleaseDetail | null): NormalizedTrack[] {
  if (!detail) return [];
  return detail.tracklist
    .filter((t) => !t.type_ || !SKIPPED_TRACK_TYPES.has(t.type_))
    .map((t) => ({
      position: t.position,
      title: t.title || "Untitled",
      duration: t.duration || null,
    }));
}

export function mapRelease(item: DiscogsCollectionItem, detail: DiscogsReleaseDetail | null): NormalizedRelease {
  const info = item.basic_information;
  const artists = info.artists.map((a) => cleanArtistName(a.name)).filter((n) => n !== "");
  const label = info.labels[0];

  return {
    remoteId: String(info.id),
    title: info.title || "Untitled",
    artist: artists.length > 0 ? artists.join(", ") : "Unknown",
    label: label?.name || null,
    catalogNumber: label?.catno || null,
    year: info.year || null,
    coverArtUrl: info.cover_image || null,
    uri: `https://www.discogs.com/release/${info.id}`,
    tracks: mapTracklist(detail),
  };
}

export function formatPrice(price: DiscogsListing["price"]): string | null {
  if (!price) return null;
  return `${price.value.toFixed(2)} ${price.currency}`;
}

export function mapListingStatus(status: string | undefined): NormalizedListing["status"] {
  switch (status) {
    case "Draft":
      return "draft";
    case "Expired":
      return "expired";
    case "Sold":
      return "sold";
    default:
      return "for_sale";
  }
}

export function mapListing(raw: DiscogsListing): NormalizedListing {
  return {
    remoteId: String(raw.id),
    releaseRemoteId: String(raw.release.id),
    releaseTitle: raw.release.title || null,
    releaseArtist: raw.release.artist ? cleanArtistName(raw.release.artist) : null,
    condition: raw.condition || null,
    sleeveCondition: raw.sleeve_condition || null,
    price: formatPrice(raw.price),
    location: raw.location || null,
    comments: raw.comments || null,
    status: mapListingStatus(raw.status),
    listedAt: raw.posted || null,
  };
}
