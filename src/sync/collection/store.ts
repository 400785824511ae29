import type Database from "better-sqlite3";
import { z } from "zod";
import { withStore } from "@/sync/ledger/db";
import { errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { planTrackMerge, trackHasUserData, type EntityStore, type UpsertOutcome } from "@/sync/engine/merge";
import type { NormalizedRelease, ReleaseRecord, TrackRecord } from "@/sync/types";

const log = createChildLogger("collection-store");

const userCorrectionsSchema = z.record(z.unknown());

interface RawReleaseRow {
  id: number;
  user_id: number;
  remote_id: string;
  title: string;
  artist: string;
  label: string | null;
  catalog_number: string | null;
  year: number | null;
  cover_art_url: string | null;
  uri: string | null;
  notes: string | null;
  user_corrections: string | null;
  kept_after_removal: number | null;
  last_seen_run_id: string | null;
  synced_at: string | null;
  removed_at: string | null;
}

interface RawTrackRow {
  id: number;
  release_id: number;
  position: string;
  title: string;
  duration: string | null;
  bpm: number | null;
  musical_key: string | null;
  camelot: string | null;
  energy: number | null;
  is_playable: number;
  notes: string | null;
  tag_count: number;
}

export function findRelease(userId: number, remoteId: string): ReleaseRecord | undefined {
  return withStore("findRelease", (db) => {
    const row = db
      .prepare<[number, string], RawReleaseRow>("SELECT * FROM releases WHERE user_id = ? AND remote_id = ?")
      .get(userId, remoteId);
    return row ? toReleaseRecord(row) : undefined;
  });
}

export function listReleases(userId: number): ReleaseRecord[] {
  return withStore("listReleases", (db) =>
    db
      .prepare<[number], RawReleaseRow>("SELECT * FROM releases WHERE user_id = ? ORDER BY id")
      .all(userId)
      .map(toReleaseRecord),
  );
}

/** Tracks of a release in insertion order. */
export function listTracks(releaseId: number): TrackRecord[] {
  return withStore("listTracks", (db) => selectTracks(db, releaseId).map(toTrackRecord));
}

/**
 * Releases with nested tracks. Discogs data overwrites canonical columns;
 * DJ annotations (bpm, key, energy, notes, tags, corrections) are never
 * touched, and annotated tracks survive their removal from the tracklist.
 */
export const releaseStore: EntityStore<NormalizedRelease> = {
  upsert(userId, release, runId): UpsertOutcome {
    return withStore("upsertRelease", (db) => {
      const apply = db.transaction((): UpsertOutcome => {
        const now = new Date().toISOString();
        const existing = db
          .prepare<[number, string], { id: number; removed_at: string | null }>(
            "SELECT id, removed_at FROM releases WHERE user_id = ? AND remote_id = ?",
          )
          .get(userId, release.remoteId);

        let releaseId: number;
        let outcome: UpsertOutcome;

        if (!existing) {
          const result = db.prepare(`
            INSERT INTO releases (
              user_id, remote_id, title, artist, label, catalog_number, year, cover_art_url, uri,
              last_seen_run_id, synced_at, created_at, updated_at
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          `).run(
            userId,
            release.remoteId,
            release.title,
            release.artist,
            release.label,
            release.catalogNumber,
            release.year,
            release.coverArtUrl,
            release.uri,
            runId,
            now,
            now,
            now,
          );
          releaseId = Number(result.lastInsertRowid);
          outcome = "created";
        } else {
          if (existing.removed_at) {
            log.info("Release back in collection", { userId, remoteId: release.remoteId });
          }
          db.prepare(`
            UPDATE releases
            SET title = ?, artist = ?, label = ?, catalog_number = ?, year = ?, cover_art_url = ?, uri = ?,
                last_seen_run_id = ?, synced_at = ?, updated_at = ?,
                kept_after_removal = CASE WHEN removed_at IS NULL THEN kept_after_removal ELSE NULL END,
                removed_at = NULL
            WHERE id = ?
          `).run(
            release.title,
            release.artist,
            release.label,
            release.catalogNumber,
            release.year,
            release.coverArtUrl,
            release.uri,
            runId,
            now,
            now,
            existing.id,
          );
          releaseId = existing.id;
          outcome = "updated";
        }

        const existingTracks = selectTracks(db, releaseId).map((row) => ({
          id: row.id,
          position: row.position,
          hasUserData: trackHasUserData(toTrackRecord(row), row.tag_count),
        }));
        const plan = planTrackMerge(existingTracks, release.tracks);

        const updateTrack = db.prepare(
          "UPDATE tracks SET title = ?, duration = ?, updated_at = ? WHERE id = ?",
        );
        for (const { id, track } of plan.update) {
          updateTrack.run(track.title, track.duration, now, id);
        }

        const insertTrack = db.prepare(`
          INSERT INTO tracks (release_id, position, title, duration, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?, ?)
        `);
        for (const track of plan.create) {
          insertTrack.run(releaseId, track.position, track.title, track.duration, now, now);
        }

        const deleteTrack = db.prepare("DELETE FROM tracks WHERE id = ?");
        for (const id of plan.remove) {
          deleteTrack.run(id);
        }

        if (plan.orphaned.length > 0) {
          log.debug("Keeping annotated tracks missing from Discogs", {
            remoteId: release.remoteId,
            trackIds: plan.orphaned,
          });
        }
        if (plan.duplicates.length > 0) {
          log.warn("Discogs tracklist repeats positions; later entries ignored", {
            remoteId: release.remoteId,
            positions: plan.duplicates.map((t) => t.position),
          });
        }

        return outcome;
      });

      return apply();
    });
  },

  markSeen(userId, remoteId, runId) {
    withStore("markReleaseSeen", (db) => {
      db.prepare("UPDATE releases SET last_seen_run_id = ? WHERE user_id = ? AND remote_id = ?")
        .run(runId, userId, remoteId);
    });
  },

  markUnseenRemoved(userId, runId) {
    return withStore("markReleasesRemoved", (db) => {
      const now = new Date().toISOString();
      const result = db.prepare(`
        UPDATE releases
        SET removed_at = ?, updated_at = ?
        WHERE user_id = ?
          AND removed_at IS NULL
          AND (last_seen_run_id IS NULL OR last_seen_run_id != ?)
      `).run(now, now, userId, runId);
      return result.changes;
    });
  },
};

// --- Internal helpers ---

function selectTracks(db: Database.Database, releaseId: number): RawTrackRow[] {
  return db
    .prepare<[number], RawTrackRow>(`
      SELECT t.*, (SELECT COUNT(*) FROM track_tags tt WHERE tt.track_id = t.id) AS tag_count
      FROM tracks t
      WHERE t.release_id = ?
      ORDER BY t.id
    `)
    .all(releaseId);
}

function toReleaseRecord(row: RawReleaseRow): ReleaseRecord {
  return {
    id: row.id,
    userId: row.user_id,
    remoteId: row.remote_id,
    title: row.title,
    artist: row.artist,
    label: row.label,
    catalogNumber: row.catalog_number,
    year: row.year,
    coverArtUrl: row.cover_art_url,
    uri: row.uri,
    notes: row.notes,
    userCorrections: parseCorrections(row.user_corrections),
    keptAfterRemoval: row.kept_after_removal === null ? null : row.kept_after_removal === 1,
    lastSeenRunId: row.last_seen_run_id,
    syncedAt: row.synced_at,
    removedAt: row.removed_at,
  };
}

function toTrackRecord(row: RawTrackRow): TrackRecord {
  return {
    id: row.id,
    releaseId: row.release_id,
    position: row.position,
    title: row.title,
    duration: row.duration,
    bpm: row.bpm,
    musicalKey: row.musical_key,
    camelot: row.camelot,
    energy: row.energy,
    isPlayable: row.is_playable === 1,
    notes: row.notes,
  };
}

function parseCorrections(text: string | null): Record<string, unknown> | null {
  if (!text) return null;
  try {
    const parsed = userCorrectionsSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    log.warn("Ignoring unreadable user corrections", { error: errorMessage(error) });
    return null;
  }
}
