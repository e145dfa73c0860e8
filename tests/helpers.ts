import { EMPTY_AUDIO_FEATURES, type AudioFeatures, type Track } from "../src/domain/track";

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function emptyResponse(status: number, headers: Record<string, string> = {}): Response {
  return new Response(null, { status, headers });
}

export function features(overrides: Partial<AudioFeatures> = {}): AudioFeatures {
  return {
    acousticness: 0.1,
    danceability: 0.5,
    energy: 0.8,
    instrumentalness: 0,
    key: 5,
    liveness: 0.2,
    loudness: -6.5,
    mode: 1,
    speechiness: 0.05,
    tempo: 120,
    valence: 0.7,
    ...overrides,
  };
}

export function makeTrack(overrides: Partial<Track> = {}): Track {
  return {
    id: "t1",
    name: "Song",
    artists: [{ id: "a1", name: "Artist" }],
    album: { id: "al1", name: "Album", imageUrl: "", releaseDate: "1999-05-01" },
    genre: "rock",
    ...EMPTY_AUDIO_FEATURES,
    ...overrides,
  };
}

export function authorizationOf(init: RequestInit | undefined): string | null {
  return new Headers(init?.headers).get("Authorization");
}
