// Test fixtures - Discogs-shaped records with made-up data

export interface FakeTrack {
  position: string;
  title: string;
  duration?: string;
  type_?: string;
}

export interface FakeRelease {
  id: number;
  title: string;
  artists?: string[];
  year?: number;
  label?: string;
  catno?: string;
  tracklist?: FakeTrack[];
}

export function release(id: number, title: string, overrides: Partial<FakeRelease> = {}): FakeRelease {
  return { id, title, ...overrides };
}

export function releases(...ids: number[]): FakeRelease[] {
  return ids.map((id) => release(id, `Release ${id}`, { tracklist: [{ position: "A1", title: `Track ${id}` }] }));
}

export function listing(id: number, releaseId: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    status: "For Sale",
    condition: "Very Good Plus (VG+)",
    sleeve_condition: "Very Good (VG)",
    price: { value: 15, currency: "USD" },
    location: "Crate 1",
    comments: "",
    posted: "2024-03-01T12:00:00-08:00",
    release: { id: releaseId, title: `Release ${releaseId}`, artist: "Test Artist" },
    ...overrides,
  };
}

export const testCredentials = { personalToken: "test-token" };
