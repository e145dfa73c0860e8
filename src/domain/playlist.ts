import { getDecade, type Track } from "./track";

export interface Playlist {
  id: string;
  name: string;
  description: string;
  imageUrl: string;
  trackCount: number;
}

function groupBy(tracks: readonly Track[], keyOf: (track: Track) => string): Map<string, Track[]> {
  const groups = new Map<string, Track[]>();
  for (const track of tracks) {
    const key = keyOf(track);
    const group = groups.get(key);
    if (group) {
      group.push(track);
    } else {
      groups.set(key, [track]);
    }
  }
  return groups;
}

/**
 * Genre → tracks, in order of first appearance.
 */
export function groupTracksByGenre(tracks: readonly Track[]): Map<string, Track[]> {
  return groupBy(tracks, (track) => track.genre);
}

/**
 * Decade → tracks, decades ascending ("unknown" sorts after the digits).
 */
export function groupTracksByDecade(tracks: readonly Track[]): Map<string, Track[]> {
  const groups = groupBy(tracks, getDecade);
  const keys = [...groups.keys()].sort((a, b) => a.localeCompare(b, "en"));
  return new Map(keys.map((key) => [key, groups.get(key) ?? []]));
}
