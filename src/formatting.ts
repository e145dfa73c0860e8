import type { Playlist } from "./domain/playlist";
import {
  getArtistDisplay,
  getMood,
  getReleaseYear,
  type Track,
} from "./domain/track";

export type OutputFormat = "json" | "text";

export function normalizeFormat(value: string | undefined): OutputFormat {
  const normalized = (value ?? "text").toLowerCase();
  if (normalized === "json" || normalized === "text") {
    return normalized;
  }
  throw new Error("Only --format text or --format json is supported.");
}

function formatLabel(value: string | null | undefined): string {
  if (!value) return "Unknown";
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : "Unknown";
}

// tempo 0 means no audio features were found
function hasAudioFeatures(track: Track): boolean {
  return track.tempo > 0;
}

export function formatTrackLine(track: Track, index: number): string {
  const artist = formatLabel(getArtistDisplay(track));
  const album = formatLabel(track.album.name);
  const year = getReleaseYear(track) ?? "Unknown";
  const features = hasAudioFeatures(track)
    ? ` [${getMood(track)}, ${Math.round(track.tempo)} BPM]`
    : "";
  return `  ${index + 1}. ${track.name} - ${artist} (${album}, ${year}) {${track.genre}}${features}`;
}

export function formatTrackList(tracks: readonly Track[]): string[] {
  return tracks.map((track, index) => formatTrackLine(track, index));
}

export function formatGroups(groups: Map<string, Track[]>): string {
  const lines: string[] = [];
  for (const [key, tracks] of groups) {
    lines.push(`${key} (${tracks.length})`);
    lines.push(...formatTrackList(tracks));
  }
  return lines.join("\n");
}

export function formatPlaylists(playlists: readonly Playlist[]): string {
  if (playlists.length === 0) {
    return "No playlists found.";
  }
  const lines = playlists.map(
    (p, index) => `  ${index + 1}. ${p.name} (${p.trackCount} tracks) [${p.id}]`
  );
  return [`${playlists.length} playlists:`, ...lines].join("\n");
}

export function trackToJson(track: Track): Record<string, unknown> {
  return {
    id: track.id,
    name: track.name,
    artists: track.artists.map((a) => a.name),
    album: track.album.name,
    release_year: getReleaseYear(track),
    genre: track.genre,
    mood: hasAudioFeatures(track) ? getMood(track) : null,
    audio_features: {
      acousticness: track.acousticness,
      danceability: track.danceability,
      energy: track.energy,
      instrumentalness: track.instrumentalness,
      key: track.key,
      liveness: track.liveness,
      loudness: track.loudness,
      mode: track.mode,
      speechiness: track.speechiness,
      tempo: track.tempo,
      valence: track.valence,
    },
  };
}

export function formatTracksAsJson(
  playlist: Pick<Playlist, "id" | "name">,
  tracks: readonly Track[],
  groups?: Map<string, Track[]>
): string {
  const output: Record<string, unknown> = {
    playlist_id: playlist.id,
    playlist_name: playlist.name,
    count: tracks.length,
    tracks: tracks.map(trackToJson),
  };
  if (groups) {
    output.groups = Object.fromEntries(
      [...groups].map(([key, group]) => [key, group.map((t) => t.id)])
    );
  }
  return JSON.stringify(output, null, 2);
}
