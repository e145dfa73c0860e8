import type { CombinedFilter } from "../domain/filters";
import type { Playlist } from "../domain/playlist";
import { toSpotifyUri, type Track } from "../domain/track";
import { log } from "../lib/logger";
import type { PlaylistService } from "../spotify/playlists";

export type CopyOptions = {
  playlists: PlaylistService;
  tracks: readonly Track[];
  filter: CombinedFilter;
  playlistName?: string | undefined;
  description?: string | undefined;
  dryRun?: boolean | undefined;
  signal?: AbortSignal | undefined;
};

export type CopyResult = {
  playlist: Playlist | null;
  created: boolean;
  matched: Track[];
  copied: number;
};

export function selectTracks(tracks: readonly Track[], filter: CombinedFilter): Track[] {
  const seen = new Set<string>();
  const selected: Track[] = [];
  for (const track of tracks) {
    if (seen.has(track.id) || !filter.matches(track)) continue;
    seen.add(track.id);
    selected.push(track);
  }
  return selected;
}

/**
 * Copies the tracks matching `filter` into the playlist named `playlistName`
 * (default: the filter's suggested name), creating it when it does not exist.
 */
export async function copyFilteredTracks(options: CopyOptions): Promise<CopyResult> {
  const matched = selectTracks(options.tracks, options.filter);
  log(`[copy] ${options.filter.name}: ${matched.length}/${options.tracks.length} tracks match`);

  if (matched.length === 0 || options.dryRun) {
    return { playlist: null, created: false, matched, copied: 0 };
  }

  const name = options.playlistName?.trim() || options.filter.suggestedName;
  const description = options.description ?? `Filtered by ${options.filter.name}`;
  const { playlist, created } = await options.playlists.getOrCreatePlaylist(
    name,
    description,
    options.signal
  );

  const copied = await options.playlists.addTracksToPlaylist(
    playlist.id,
    matched.map(toSpotifyUri),
    options.signal
  );

  return { playlist, created, matched, copied };
}
