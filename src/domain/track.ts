export const UNKNOWN_GENRE = "unknown";

export type AudioFeatures = {
  acousticness: number;
  danceability: number;
  energy: number;
  instrumentalness: number;
  key: number;
  liveness: number;
  loudness: number;
  mode: number;
  speechiness: number;
  tempo: number;
  valence: number;
};

export const AUDIO_FEATURE_FIELDS = [
  "acousticness",
  "danceability",
  "energy",
  "instrumentalness",
  "key",
  "liveness",
  "loudness",
  "mode",
  "speechiness",
  "tempo",
  "valence",
] as const satisfies readonly (keyof AudioFeatures)[];

export const EMPTY_AUDIO_FEATURES: AudioFeatures = {
  acousticness: 0,
  danceability: 0,
  energy: 0,
  instrumentalness: 0,
  key: 0,
  liveness: 0,
  loudness: 0,
  mode: 0,
  speechiness: 0,
  tempo: 0,
  valence: 0,
};

export interface Artist {
  id: string;
  name: string;
}

export interface Album {
  id: string;
  name: string;
  imageUrl: string;
  releaseDate: string;
}

export interface Track extends AudioFeatures {
  id: string;
  name: string;
  artists: Artist[];
  album: Album;
  genre: string;
}

export type Mood =
  | "Upbeat/Happy"
  | "Chill/Calm"
  | "Sad/Gloomy"
  | "Angry/Aggressive"
  | "Neutral";

export function getMood(track: Pick<Track, "valence" | "energy">): Mood {
  const { valence, energy } = track;
  if (valence > 0.6 && energy > 0.6) return "Upbeat/Happy";
  if (valence > 0.5 && energy < 0.4) return "Chill/Calm";
  if (valence < 0.3 && energy < 0.3) return "Sad/Gloomy";
  if (valence < 0.3 && energy > 0.7) return "Angry/Aggressive";
  return "Neutral";
}

export function getReleaseYear(track: Pick<Track, "album">): number | null {
  const releaseDate = track.album.releaseDate;
  if (!releaseDate || releaseDate.length < 4) return null;
  const prefix = releaseDate.slice(0, 4);
  if (!/^\d{4}$/.test(prefix)) return null;
  return Number.parseInt(prefix, 10);
}

/**
 * "1990s", "2000s", ... or "unknown" when the release date has no year.
 */
export function getDecade(track: Pick<Track, "album">): string {
  const year = getReleaseYear(track);
  if (year === null) return "unknown";
  return `${Math.floor(year / 10) * 10}s`;
}

export function getArtistDisplay(track: Pick<Track, "artists">): string {
  return track.artists.map((a) => a.name).join(", ");
}

export function toSpotifyUri(track: Pick<Track, "id">): string {
  return `spotify:track:${track.id}`;
}

/**
 * Validates an audio-features object from the wire or the cache.
 * Absent fields read as 0; a non-numeric field or an object with none of
 * the fields is rejected.
 */
export function parseAudioFeatures(payload: unknown): AudioFeatures | null {
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    return null;
  }

  const record = payload as Record<string, unknown>;
  const features: AudioFeatures = { ...EMPTY_AUDIO_FEATURES };
  let present = 0;

  for (const field of AUDIO_FEATURE_FIELDS) {
    const value = record[field];
    if (value === undefined || value === null) continue;
    if (typeof value !== "number" || !Number.isFinite(value)) return null;
    features[field] = field === "key" || field === "mode" ? Math.trunc(value) : value;
    present++;
  }

  return present > 0 ? features : null;
}
