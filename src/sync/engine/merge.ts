import type { NormalizedEntity, NormalizedTrack, TrackRecord } from "@/sync/types";

export type UpsertOutcome = "created" | "updated";

/**
 * Local side of a sync: persists entities of one resource kind.
 *
 * `upsert` overwrites canonical fields only; local-only fields are never
 * written. `markUnseenRemoved` soft-removes whatever the given run did not
 * see and returns how many records it flagged.
 */
export interface EntityStore<TEntity extends NormalizedEntity> {
  upsert(userId: number, entity: TEntity, runId: string): UpsertOutcome;
  markSeen(userId: number, remoteId: string, runId: string): void;
  markUnseenRemoved(userId: number, runId: string): number;
}

export interface ExistingTrack {
  id: number;
  position: string;
  hasUserData: boolean;
}

export interface TrackMergePlan {
  update: Array<{ id: number; track: NormalizedTrack }>;
  create: NormalizedTrack[];
  remove: number[];
  /** Gone from Discogs but annotated locally, so kept. */
  orphaned: number[];
  /** Later remote tracks repeating a position already applied. */
  duplicates: NormalizedTrack[];
}

/**
 * Match tracks by position, verbatim. First match wins on both sides:
 * the lowest local id owns a position, and only the first remote track at
 * a position is applied.
 */
export function planTrackMerge(existing: ExistingTrack[], incoming: NormalizedTrack[]): TrackMergePlan {
  const plan: TrackMergePlan = { update: [], create: [], remove: [], orphaned: [], duplicates: [] };

  const ordered = [...existing].sort((a, b) => a.id - b.id);
  const byPosition = new Map<string, ExistingTrack>();
  for (const track of ordered) {
    if (!byPosition.has(track.position)) {
      byPosition.set(track.position, track);
    }
  }

  const seenPositions = new Set<string>();
  const matchedIds = new Set<number>();

  for (const track of incoming) {
    if (seenPositions.has(track.position)) {
      plan.duplicates.push(track);
      continue;
    }
    seenPositions.add(track.position);

    const match = byPosition.get(track.position);
    if (match) {
      plan.update.push({ id: match.id, track });
      matchedIds.add(match.id);
    } else {
      plan.create.push(track);
    }
  }

  for (const track of ordered) {
    if (matchedIds.has(track.id)) continue;
    if (track.hasUserData) {
      plan.orphaned.push(track.id);
    } else {
      plan.remove.push(track.id);
    }
  }

  return plan;
}

export function trackHasUserData(track: TrackRecord, tagCount: number): boolean {
  return (
    track.bpm !== null ||
    track.musicalKey !== null ||
    track.camelot !== null ||
    track.energy !== null ||
    track.isPlayable ||
    Boolean(track.notes) ||
    tagCount > 0
  );
}
