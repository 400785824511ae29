import { withStore } from "@/sync/ledger/db";
import { createChildLogger } from "@/sync/logger";
import type { EntityStore, UpsertOutcome } from "@/sync/engine/merge";
import type { ListingRecord, ListingStatus, NormalizedListing } from "@/sync/types";

const log = createChildLogger("inventory-store");

interface RawListingRow {
  id: number;
  user_id: number;
  remote_id: string;
  release_remote_id: string;
  release_id: number | null;
  release_title: string | null;
  release_artist: string | null;
  condition: string | null;
  sleeve_condition: string | null;
  price: string | null;
  location: string | null;
  comments: string | null;
  status: string;
  listed_at: string | null;
  sold_at: string | null;
  notes: string | null;
  notification_dismissed: number;
  last_seen_run_id: string | null;
  synced_at: string | null;
  removed_at: string | null;
}

const LISTING_STATUSES: readonly ListingStatus[] = ["for_sale", "draft", "expired", "sold", "removed"];

export function findListing(userId: number, remoteId: string): ListingRecord | undefined {
  return withStore("findListing", (db) => {
    const row = db
      .prepare<[number, string], RawListingRow>("SELECT * FROM inventory_listings WHERE user_id = ? AND remote_id = ?")
      .get(userId, remoteId);
    return row ? toListingRecord(row) : undefined;
  });
}

export function listListings(userId: number): ListingRecord[] {
  return withStore("listListings", (db) =>
    db
      .prepare<[number], RawListingRow>("SELECT * FROM inventory_listings WHERE user_id = ? ORDER BY id")
      .all(userId)
      .map(toListingRecord),
  );
}

/** Sold or removed listings whose notification the user has not dismissed. */
export function listListingsNeedingAttention(userId: number): ListingRecord[] {
  return withStore("listListingsNeedingAttention", (db) =>
    db
      .prepare<[number], RawListingRow>(`
        SELECT * FROM inventory_listings
        WHERE user_id = ? AND status IN ('sold', 'removed') AND notification_dismissed = 0
        ORDER BY id
      `)
      .all(userId)
      .map(toListingRecord),
  );
}

export function dismissListingNotification(userId: number, remoteId: string): boolean {
  return withStore("dismissListingNotification", (db) => {
    const result = db
      .prepare("UPDATE inventory_listings SET notification_dismissed = 1 WHERE user_id = ? AND remote_id = ?")
      .run(userId, remoteId);
    return result.changes > 0;
  });
}

/**
 * Flat marketplace listings. A listing links to the user's local release
 * for the same Discogs release when there is one; listings for records
 * outside the collection keep the cached title and artist instead. A listing
 * turning sold gets `sold_at` stamped and its notification re-armed.
 */
export const listingStore: EntityStore<NormalizedListing> = {
  upsert(userId, listing, runId): UpsertOutcome {
    return withStore("upsertListing", (db) => {
      const apply = db.transaction((): UpsertOutcome => {
        const now = new Date().toISOString();
        const release = db
          .prepare<[number, string], { id: number }>("SELECT id FROM releases WHERE user_id = ? AND remote_id = ?")
          .get(userId, listing.releaseRemoteId);
        const releaseId = release?.id ?? null;

        const existing = db
          .prepare<[number, string], { id: number; status: string; sold_at: string | null; removed_at: string | null }>(
            "SELECT id, status, sold_at, removed_at FROM inventory_listings WHERE user_id = ? AND remote_id = ?",
          )
          .get(userId, listing.remoteId);
        const isSold = listing.status === "sold";

        if (!existing) {
          db.prepare(`
            INSERT INTO inventory_listings (
              user_id, remote_id, release_remote_id, release_id, release_title, release_artist,
              condition, sleeve_condition, price, location, comments, status, listed_at, sold_at,
              last_seen_run_id, synced_at, created_at, updated_at
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          `).run(
            userId,
            listing.remoteId,
            listing.releaseRemoteId,
            releaseId,
            listing.releaseTitle,
            listing.releaseArtist,
            listing.condition,
            listing.sleeveCondition,
            listing.price,
            listing.location,
            listing.comments,
            listing.status,
            listing.listedAt,
            isSold ? now : null,
            runId,
            now,
            now,
            now,
          );
          return "created";
        }

        const newlySold = isSold && existing.status !== "sold";
        if (newlySold) {
          log.info("Listing sold", { userId, remoteId: listing.remoteId });
        } else if (existing.removed_at) {
          log.info("Listing back in inventory", { userId, remoteId: listing.remoteId });
        }

        db.prepare(`
          UPDATE inventory_listings
          SET release_remote_id = ?, release_id = ?, release_title = ?, release_artist = ?,
              condition = ?, sleeve_condition = ?, price = ?, location = ?, comments = ?,
              status = ?, listed_at = ?, sold_at = ?,
              notification_dismissed = CASE WHEN ? THEN 0 ELSE notification_dismissed END,
              last_seen_run_id = ?, synced_at = ?, updated_at = ?, removed_at = NULL
          WHERE id = ?
        `).run(
          listing.releaseRemoteId,
          releaseId,
          listing.releaseTitle,
          listing.releaseArtist,
          listing.condition,
          listing.sleeveCondition,
          listing.price,
          listing.location,
          listing.comments,
          listing.status,
          listing.listedAt,
          isSold ? (existing.sold_at ?? now) : null,
          newlySold ? 1 : 0,
          runId,
          now,
          now,
          existing.id,
        );
        return "updated";
      });

      return apply();
    });
  },

  markSeen(userId, remoteId, runId) {
    withStore("markListingSeen", (db) => {
      db.prepare("UPDATE inventory_listings SET last_seen_run_id = ? WHERE user_id = ? AND remote_id = ?")
        .run(runId, userId, remoteId);
    });
  },

  // A vanished listing was withdrawn; flag it for the user's attention. One
  // already known as sold keeps that status and its earlier notification.
  markUnseenRemoved(userId, runId) {
    return withStore("markListingsRemoved", (db) => {
      const now = new Date().toISOString();
      const result = db.prepare(`
        UPDATE inventory_listings
        SET status = CASE WHEN status = 'sold' THEN status ELSE 'removed' END,
            notification_dismissed = CASE WHEN status = 'sold' THEN notification_dismissed ELSE 0 END,
            removed_at = ?, updated_at = ?
        WHERE user_id = ?
          AND removed_at IS NULL
          AND (last_seen_run_id IS NULL OR last_seen_run_id != ?)
      `).run(now, now, userId, runId);
      return result.changes;
    });
  },
};

function toListingRecord(row: RawListingRow): ListingRecord {
  const status = LISTING_STATUSES.find((s) => s === row.status);
  if (!status) {
    throw new Error(`Unknown listing status: ${row.status}`);
  }
  return {
    id: row.id,
    userId: row.user_id,
    remoteId: row.remote_id,
    releaseRemoteId: row.release_remote_id,
    releaseId: row.release_id,
    releaseTitle: row.release_title,
    releaseArtist: row.release_artist,
    condition: row.condition,
    sleeveCondition: row.sleeve_condition,
    price: row.price,
    location: row.location,
    comments: row.comments,
    status,
    listedAt: row.listed_at,
    soldAt: row.sold_at,
    notes: row.notes,
    notificationDismissed: row.notification_dismissed === 1,
    lastSeenRunId: row.last_seen_run_id,
    syncedAt: row.synced_at,
    removedAt: row.removed_at,
  };
}
