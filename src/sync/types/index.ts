export type ResourceKind = "collection" | "inventory";

export const RESOURCE_KINDS: readonly ResourceKind[] = ["collection", "inventory"];

/** Anything the engine can sync: a stable remote id plus canonical fields. */
export interface NormalizedEntity {
  remoteId: string;
}

export interface NormalizedTrack {
  position: string;
  title: string;
  duration: string | null;
}

export interface NormalizedRelease extends NormalizedEntity {
  title: string;
  artist: string;
  label: string | null;
  catalogNumber: string | null;
  year: number | null;
  coverArtUrl: string | null;
  uri: string;
  tracks: NormalizedTrack[];
}

export type ListingStatus = "for_sale" | "draft" | "expired" | "sold" | "removed";

export interface NormalizedListing extends NormalizedEntity {
  releaseRemoteId: string;
  releaseTitle: string | null;
  releaseArtist: string | null;
  condition: string | null;
  sleeveCondition: string | null;
  price: string | null;
  location: string | null;
  comments: string | null;
  status: Exclude<ListingStatus, "removed">;
  listedAt: string | null;
}

// --- Local records (as stored) ---

export interface ReleaseRecord {
  id: number;
  userId: number;
  remoteId: string;
  title: string;
  artist: string;
  label: string | null;
  catalogNumber: string | null;
  year: number | null;
  coverArtUrl: string | null;
  uri: string | null;
  notes: string | null;
  userCorrections: Record<string, unknown> | null;
  keptAfterRemoval: boolean | null;
  lastSeenRunId: string | null;
  syncedAt: string | null;
  removedAt: string | null;
}

export interface TrackRecord {
  id: number;
  releaseId: number;
  position: string;
  title: string;
  duration: string | null;
  bpm: number | null;
  musicalKey: string | null;
  camelot: string | null;
  energy: number | null;
  isPlayable: boolean;
  notes: string | null;
}

export interface ListingRecord {
  id: number;
  userId: number;
  remoteId: string;
  releaseRemoteId: string;
  releaseId: number | null;
  releaseTitle: string | null;
  releaseArtist: string | null;
  condition: string | null;
  sleeveCondition: string | null;
  price: string | null;
  location: string | null;
  comments: string | null;
  status: ListingStatus;
  listedAt: string | null;
  soldAt: string | null;
  notes: string | null;
  notificationDismissed: boolean;
  lastSeenRunId: string | null;
  syncedAt: string | null;
  removedAt: string | null;
}
