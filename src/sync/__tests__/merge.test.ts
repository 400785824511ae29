import { describe, it, expect } from "vitest";
import { planTrackMerge, trackHasUserData } from "@/sync/engine/merge";
import type { TrackRecord } from "@/sync/types";

const track = (position: string, title: string) => ({ position, title, duration: null });

describe("planTrackMerge", () => {
  it("matches by position and keeps annotated tracks that disappeared", () => {
    const plan = planTrackMerge(
      [
        { id: 3, position: "A1", hasUserData: false },
        { id: 1, position: "A2", hasUserData: true },
        { id: 2, position: "B1", hasUserData: false },
        { id: 4, position: "A1", hasUserData: false },
      ],
      [track("A1", "New A1"), track("C1", "Bonus"), track("A1", "Repeat")],
    );

    expect(plan).toEqual({
      update: [{ id: 3, track: track("A1", "New A1") }],
      create: [track("C1", "Bonus")],
      remove: [2, 4],
      orphaned: [1],
      duplicates: [track("A1", "Repeat")],
    });
  });

  it("treats an empty position as an ordinary key", () => {
    const plan = planTrackMerge([{ id: 1, position: "", hasUserData: false }], [track("", "Untitled")]);

    expect(plan.update).toEqual([{ id: 1, track: track("", "Untitled") }]);
    expect(plan.create).toEqual([]);
    expect(plan.remove).toEqual([]);
  });

  it("creates everything for a release with no local tracks", () => {
    const plan = planTrackMerge([], [track("A1", "One"), track("A2", "Two")]);

    expect(plan.create).toHaveLength(2);
    expect(plan.update).toEqual([]);
  });
});

describe("trackHasUserData", () => {
  const bare: TrackRecord = {
    id: 1,
    releaseId: 1,
    position: "A1",
    title: "Intro",
    duration: null,
    bpm: null,
    musicalKey: null,
    camelot: null,
    energy: null,
    isPlayable: false,
    notes: null,
  };

  it("is false for an untouched track", () => {
    expect(trackHasUserData(bare, 0)).toBe(false);
    expect(trackHasUserData({ ...bare, notes: "" }, 0)).toBe(false);
  });

  it("counts annotations and tags", () => {
    expect(trackHasUserData({ ...bare, bpm: 124 }, 0)).toBe(true);
    expect(trackHasUserData({ ...bare, camelot: "8A" }, 0)).toBe(true);
    expect(trackHasUserData({ ...bare, isPlayable: true }, 0)).toBe(true);
    expect(trackHasUserData(bare, 2)).toBe(true);
  });
});
